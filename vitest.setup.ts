import { vi } from "vitest";

delete process.env.DATABASE_URL;

if (!process.env.ADMIN_TOKEN) {
  process.env.ADMIN_TOKEN = "test-admin-token";
}

process.env.AVIATOR_ENGINE_ENABLED = "false";

// Request and engine logs are noise under test; set DEBUG_LOGS=1 to see them.
const logSpy = vi.spyOn(console, "log");
if (!process.env.DEBUG_LOGS) {
  logSpy.mockImplementation(() => undefined);
}
