import { describe, expect, it } from "vitest";
import { readApiConfigFromEnv } from "./env.js";

describe("readApiConfigFromEnv", () => {
  it("uses defaults when nothing is set", () => {
    expect(readApiConfigFromEnv({})).toEqual({
      port: 8790,
      generationTimeoutMs: 25_000,
      storeDriver: "sqlite",
      databasePath: "toxedit.sqlite",
    });
  });

  it("reads overrides", () => {
    expect(
      readApiConfigFromEnv({
        TOXEDIT_API_PORT: "9000",
        TOXEDIT_GENERATION_TIMEOUT_MS: " 500 ",
        TOXEDIT_STORE: "Memory",
        TOXEDIT_DB_PATH: "/var/lib/toxedit/versions.sqlite",
      }),
    ).toEqual({
      port: 9000,
      generationTimeoutMs: 500,
      storeDriver: "memory",
      databasePath: "/var/lib/toxedit/versions.sqlite",
    });
  });

  it.each(["0", "-5", "12abc", "1.5"])("rejects %s as a timeout", (raw) => {
    expect(() => readApiConfigFromEnv({ TOXEDIT_GENERATION_TIMEOUT_MS: raw })).toThrow(
      `invalid TOXEDIT_GENERATION_TIMEOUT_MS: ${raw}`,
    );
  });

  it("rejects an unknown store driver", () => {
    expect(() => readApiConfigFromEnv({ TOXEDIT_STORE: "postgres" })).toThrow("invalid TOXEDIT_STORE: postgres");
  });
});
