import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { validateRequiredEnvVars } from "./validate-env.js";

describe("validateRequiredEnvVars", () => {
  beforeEach(() => {
    vi.stubEnv("NODE_ENV", "production");
    vi.stubEnv("COMPUTE_BACKEND", "");
    vi.stubEnv("DATABASE_URL", "");
    vi.stubEnv("OPENSTACK_AUTH_URL", "");
    vi.stubEnv("OPENSTACK_USERNAME", "");
    vi.stubEnv("OPENSTACK_PASSWORD", "");
    vi.stubEnv("OPENSTACK_PROJECT_NAME", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("throws when DATABASE_URL is missing for the mock backend", () => {
    expect(() => validateRequiredEnvVars()).toThrow("DATABASE_URL is required but not set");
  });

  it("does not throw when the mock backend has a database", () => {
    vi.stubEnv("DATABASE_URL", "postgresql://x");
    expect(() => validateRequiredEnvVars()).not.toThrow();
  });

  it("lists every missing OpenStack credential", () => {
    vi.stubEnv("COMPUTE_BACKEND", "openstack");
    vi.stubEnv("OPENSTACK_AUTH_URL", "http://keystone.test:5000");
    const run = () => validateRequiredEnvVars();
    expect(run).toThrow("OPENSTACK_USERNAME is required when COMPUTE_BACKEND=openstack");
    expect(run).toThrow("OPENSTACK_PASSWORD is required when COMPUTE_BACKEND=openstack");
    expect(run).not.toThrow("OPENSTACK_AUTH_URL");
  });

  it("does not require DATABASE_URL for the openstack backend", () => {
    vi.stubEnv("COMPUTE_BACKEND", "openstack");
    vi.stubEnv("OPENSTACK_AUTH_URL", "http://keystone.test:5000");
    vi.stubEnv("OPENSTACK_USERNAME", "admin");
    vi.stubEnv("OPENSTACK_PASSWORD", "test-secret");
    vi.stubEnv("OPENSTACK_PROJECT_NAME", "demo");
    expect(() => validateRequiredEnvVars()).not.toThrow();
  });

  it("warns (does not throw) when OPENSTACK_PROJECT_NAME is missing", () => {
    vi.stubEnv("COMPUTE_BACKEND", "openstack");
    vi.stubEnv("OPENSTACK_AUTH_URL", "http://keystone.test:5000");
    vi.stubEnv("OPENSTACK_USERNAME", "admin");
    vi.stubEnv("OPENSTACK_PASSWORD", "test-secret");
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(() => validateRequiredEnvVars()).not.toThrow();
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining("OPENSTACK_PROJECT_NAME"));
    warnSpy.mockRestore();
  });

  it("rejects an unknown backend", () => {
    vi.stubEnv("COMPUTE_BACKEND", "vmware");
    expect(() => validateRequiredEnvVars()).toThrow('COMPUTE_BACKEND must be "mock" or "openstack" (got "vmware")');
  });

  it("is skipped in test environment", () => {
    vi.stubEnv("NODE_ENV", "test");
    expect(() => validateRequiredEnvVars()).not.toThrow();
  });
});
