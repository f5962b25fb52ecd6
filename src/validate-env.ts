/**
 * Startup environment variable validation.
 *
 * Throws on missing critical vars. Warns on missing recommended vars.
 * Skipped in test environment.
 */
export function validateRequiredEnvVars(): void {
  if (process.env.NODE_ENV === "test") return;

  const errors: string[] = [];
  const warnings: string[] = [];
  const backend = process.env.COMPUTE_BACKEND || "mock";

  // --- Critical (server won't function without these) ---

  if (backend === "mock") {
    if (!process.env.DATABASE_URL) {
      errors.push("DATABASE_URL is required but not set");
    }
  } else if (backend === "openstack") {
    for (const name of ["OPENSTACK_AUTH_URL", "OPENSTACK_USERNAME", "OPENSTACK_PASSWORD"]) {
      if (!process.env[name]) errors.push(`${name} is required when COMPUTE_BACKEND=openstack`);
    }
    // --- Recommended ---
    if (!process.env.OPENSTACK_PROJECT_NAME) {
      warnings.push("OPENSTACK_PROJECT_NAME is not set. Keystone will reject the project-scoped token request.");
    }
  } else {
    errors.push(`COMPUTE_BACKEND must be "mock" or "openstack" (got "${backend}")`);
  }

  // --- Emit ---

  for (const w of warnings) {
    console.warn(`[env] WARNING: ${w}`);
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }
}
