/**
 * SSH-backed remote control for build-farm hosts.
 * Purpose: map RemoteControl calls onto shell commands run over ssh.
 * Assumptions: `ssh` (and `sshpass` when a password is set) are on PATH.
 * Usage: new SshRemoteControl({ remote: config.remote, clock, logger }) and pass it to runReaper.
 */

import type { RemoteConfig } from "../core/config.js";
import { RemoteError } from "../core/errors.js";
import { logHostEvent, type ReaperLogger } from "../core/logger.js";
import type {
  Clock,
  RemoteControl,
  RemoteCredentials,
  RemoteSession,
} from "../reaper/ports.js";

import {
  buildSshInvocation,
  expandBasedir,
  runCommand,
  shellQuote,
  SSH_TRANSPORT_EXIT_CODE,
  type CommandResult,
  type CommandRunner,
} from "./ssh.js";

// =============================================================================
// TYPES
// =============================================================================

export type SshRemoteControlOptions = {
  remote: RemoteConfig;
  clock: Pick<Clock, "sleep">;
  logger: ReaperLogger;
  runner?: CommandRunner;
};

export const MARKER_FILE_PREFIX = "buildbot.tac";

// =============================================================================
// ADAPTER
// =============================================================================

export class SshRemoteControl implements RemoteControl {
  // Keyed by session object; a host listed twice gets two independent sessions.
  private readonly sessions = new Map<RemoteSession, RemoteCredentials>();
  private readonly runner: CommandRunner;

  constructor(private readonly options: SshRemoteControlOptions) {
    this.runner = options.runner ?? runCommand;
  }

  async connect(host: string, credentials: RemoteCredentials): Promise<RemoteSession | null> {
    const res = await this.exec(host, credentials, "true");
    if (res.exitCode !== 0) {
      logHostEvent(
        this.options.logger,
        "remote.unreachable",
        host,
        { exit_code: res.exitCode, stderr: res.stderr.trim() },
        "warn",
      );
      return null;
    }

    const session: RemoteSession = { host };
    this.sessions.set(session, credentials);
    return session;
  }

  async disconnect(session: RemoteSession): Promise<void> {
    this.sessions.delete(session);
  }

  async reboot(session: RemoteSession): Promise<void> {
    const res = await this.run(session, this.options.remote.reboot_command);
    // The connection usually drops while the host goes down.
    if (res.exitCode !== 0 && res.exitCode !== SSH_TRANSPORT_EXIT_CODE) {
      throw new RemoteError(
        `Reboot command failed on ${session.host} (exit ${res.exitCode}): ${res.stderr.trim()}`,
      );
    }
  }

  async waitUntilIdle(session: RemoteSession): Promise<void> {
    const { idle_probe: probe, idle_poll_seconds: pollSeconds } = this.options.remote;

    while (true) {
      const res = await this.run(session, this.withBasedir(probe));
      if (res.exitCode === 0) return;
      this.assertConnected(session, res);

      logHostEvent(this.options.logger, "host.busy", session.host, { retry_seconds: pollSeconds });
      await this.options.clock.sleep(pollSeconds * 1000);
    }
  }

  async listMarkerFiles(session: RemoteSession): Promise<Set<string>> {
    const res = await this.run(session, `ls -1 ${shellQuote(this.options.remote.basedir)}`);
    this.assertConnected(session, res);
    if (res.exitCode !== 0) return new Set();

    return new Set(
      res.stdout
        .split("\n")
        .map((line) => line.trim())
        .filter((name) => name.startsWith(MARKER_FILE_PREFIX)),
    );
  }

  async tailLog(session: RemoteSession, lines: number): Promise<string> {
    const { basedir, log_file: logFile } = this.options.remote;
    const logPath = `${basedir.replace(/\/+$/, "")}/${logFile}`;

    const res = await this.run(session, `tail -n ${lines} ${shellQuote(logPath)}`);
    this.assertConnected(session, res);
    return res.exitCode === 0 ? res.stdout : "";
  }

  async requestGracefulShutdown(session: RemoteSession): Promise<boolean> {
    const res = await this.run(session, this.withBasedir(this.options.remote.shutdown_command));
    this.assertConnected(session, res);
    return res.exitCode === 0;
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async run(session: RemoteSession, command: string): Promise<CommandResult> {
    const credentials = this.sessions.get(session);
    if (!credentials) {
      throw new RemoteError(`No open session for ${session.host}`);
    }
    return this.exec(session.host, credentials, command);
  }

  private async exec(
    host: string,
    credentials: RemoteCredentials,
    command: string,
  ): Promise<CommandResult> {
    const { ssh_port: port, connect_timeout_seconds: connectTimeoutSeconds } = this.options.remote;
    const invocation = buildSshInvocation(
      { host, port, connectTimeoutSeconds, credentials },
      command,
    );

    const res = await this.runner(invocation.file, invocation.args, invocation.env);
    logHostEvent(
      this.options.logger,
      "remote.command",
      host,
      { command, exit_code: res.exitCode },
      "debug",
    );
    return res;
  }

  private assertConnected(session: RemoteSession, res: CommandResult): void {
    if (res.exitCode === SSH_TRANSPORT_EXIT_CODE) {
      throw new RemoteError(`Lost connection to ${session.host}: ${res.stderr.trim()}`);
    }
  }

  private withBasedir(template: string): string {
    return expandBasedir(template, this.options.remote.basedir);
  }
}
