import { z } from "zod";

export const DEFAULT_CANDIDATES_URL = "http://build.mozilla.org/builds/slaves_needing_reboot.txt";
export const DEFAULT_INVENTORY_URL = "http://slavealloc.build.mozilla.org/api";

export const DEFAULT_IDLE_PROBE = "! pgrep -f '[b]uildslave-runprocess'";

const RemoteSchema = z.object({
  basedir: z.string().min(1).default("/builds/slave"),
  ssh_port: z.number().int().positive().default(22),
  connect_timeout_seconds: z.number().int().positive().default(30),
  // Exits 0 when the host is not running a job. `{basedir}` is substituted.
  // The bracket keeps pgrep from matching the shell that runs the probe.
  idle_probe: z.string().min(1).default(DEFAULT_IDLE_PROBE),
  idle_poll_seconds: z.number().int().positive().default(30),
  shutdown_poll_seconds: z.number().int().nonnegative().default(5),
  shutdown_poll_attempts: z.number().int().positive().default(30),
  tegra_token: z.string().min(1).default("tegra"),
  shutdown_command: z.string().min(1).default("touch {basedir}/shutdown.stamp"),
  reboot_command: z.string().min(1).default("sudo reboot"),
  log_file: z.string().min(1).default("twistd.log"),
});

export const ReaperConfigSchema = z
  .object({
    kittens: z.string().min(1).default(DEFAULT_CANDIDATES_URL),
    inventory_url: z.string().min(1).default(DEFAULT_INVENTORY_URL),

    filter: z.string().min(1).optional(),
    filterbase: z.string().min(1).default("^%s"),
    class: z.string().min(1).optional(),

    workers: z.number().int().positive().default(4),
    dryrun: z.boolean().default(false),
    force: z.boolean().default(false),

    username: z.string().min(1).default("cltbld"),
    password: z.string().min(1).optional(),

    cachefile: z.string().min(1).optional(),
    logpath: z.string().min(1).optional(),
    debug: z.boolean().default(false),

    remote: RemoteSchema.default({}),
  })
  .strict();

export type ReaperConfigInput = z.input<typeof ReaperConfigSchema>;
export type ReaperConfig = z.infer<typeof ReaperConfigSchema>;
export type RemoteConfig = z.infer<typeof RemoteSchema>;

export type ResolvedReaperConfig = Omit<ReaperConfig, "cachefile"> & {
  cachefile: string;
};
