import { execa } from "execa";

import type { RemoteCredentials } from "../reaper/ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type SshTarget = {
  host: string;
  port: number;
  connectTimeoutSeconds: number;
  credentials: RemoteCredentials;
};

export type CommandResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type CommandRunner = (
  file: string,
  args: string[],
  env: Record<string, string>,
) => Promise<CommandResult>;

// ssh reserves 255 for its own failures (auth, DNS, refused, dropped connection).
export const SSH_TRANSPORT_EXIT_CODE = 255;

// =============================================================================
// COMMAND LINE
// =============================================================================

export function buildSshInvocation(
  target: SshTarget,
  remoteCommand: string,
): { file: string; args: string[]; env: Record<string, string> } {
  const sshArgs = [
    "-o",
    `ConnectTimeout=${target.connectTimeoutSeconds}`,
    "-p",
    String(target.port),
  ];

  const { username, password } = target.credentials;
  if (!password) {
    sshArgs.unshift("-o", "BatchMode=yes");
  }
  sshArgs.push(`${username}@${target.host}`, remoteCommand);

  if (password) {
    // sshpass reads the password from SSHPASS so it never shows up in `ps`.
    return { file: "sshpass", args: ["-e", "ssh", ...sshArgs], env: { SSHPASS: password } };
  }
  return { file: "ssh", args: sshArgs, env: {} };
}

export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_\-./=:@%+]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function expandBasedir(template: string, basedir: string): string {
  return template.replace(/\{basedir\}/g, () => shellQuote(basedir));
}

// =============================================================================
// EXECUTION
// =============================================================================

export const runCommand: CommandRunner = async (file, args, env) => {
  const res = await execa(file, args, {
    stdio: "pipe",
    reject: false,
    env: { ...process.env, ...env },
  });

  const stdout = typeof res.stdout === "string" ? res.stdout : String(res.stdout ?? "");
  const stderr = typeof res.stderr === "string" ? res.stderr : String(res.stderr ?? "");
  return { stdout, stderr, exitCode: res.exitCode ?? -1 };
};
