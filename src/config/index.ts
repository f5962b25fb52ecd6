import { z } from "zod";

/** Compute backends the lifecycle engine can be wired to. */
const COMPUTE_BACKENDS = ["mock", "openstack"] as const;

const openstackSchema = z.object({
  /** Keystone endpoint, e.g. "https://keystone.example.com:5000" (no /v3 suffix). */
  authUrl: z.string().default(""),
  projectName: z.string().default(""),
  username: z.string().default(""),
  password: z.string().default(""),
  region: z.string().min(1).default("RegionOne"),
  userDomain: z.string().min(1).default("Default"),
  projectDomain: z.string().min(1).default("Default"),
});

export type OpenStackConfig = z.infer<typeof openstackSchema>;

const configSchema = z
  .object({
    port: z.coerce.number().int().min(1).max(65535).default(8000),
    nodeEnv: z.enum(["development", "production", "test"]).default("development"),
    logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
    appName: z.string().min(1).default("compute-lifecycle-api"),
    appVersion: z.string().min(1).default("0.1.0"),

    databaseUrl: z.string().min(1).default("postgresql://localhost:5432/compute"),

    compute: z
      .object({
        backend: z.enum(COMPUTE_BACKENDS).default("mock"),
        openstack: openstackSchema.default({}),
      })
      .default({}),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.compute.backend !== "openstack") return;
    const { authUrl, username, password } = cfg.compute.openstack;
    for (const [key, value] of Object.entries({ authUrl, username, password })) {
      if (!value) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["compute", "openstack", key],
          message: `${key} is required when COMPUTE_BACKEND=openstack`,
        });
      }
    }
  });

export type Config = z.infer<typeof configSchema>;

/** Parse a raw environment into a validated Config. Exported for tests. */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    appName: env.APP_NAME,
    appVersion: env.APP_VERSION,
    databaseUrl: env.DATABASE_URL,
    compute: {
      backend: env.COMPUTE_BACKEND,
      openstack: {
        authUrl: env.OPENSTACK_AUTH_URL,
        projectName: env.OPENSTACK_PROJECT_NAME,
        username: env.OPENSTACK_USERNAME,
        password: env.OPENSTACK_PASSWORD,
        region: env.OPENSTACK_REGION,
        userDomain: env.OPENSTACK_USER_DOMAIN,
        projectDomain: env.OPENSTACK_PROJECT_DOMAIN,
      },
    },
  });
}

export const config = loadConfig(process.env);
