import { describe, expect, it } from "vitest";
import { ValidationError } from "../../src/catalog/types";
import { loadConfig } from "../../src/server/config";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      databaseUrl: undefined,
      databaseName: undefined,
      databaseTimeoutMs: undefined
    });
  });

  it("reads every supported variable", () => {
    const config = loadConfig({
      PORT: "3001",
      DATABASE_URL: "mongodb://db.internal:27017",
      DATABASE_NAME: "games",
      DATABASE_TIMEOUT_MS: "1500"
    });
    expect(config).toEqual({
      port: 3001,
      databaseUrl: "mongodb://db.internal:27017",
      databaseName: "games",
      databaseTimeoutMs: 1500
    });
  });

  it("treats empty strings as unset", () => {
    const config = loadConfig({ PORT: "", DATABASE_URL: "", DATABASE_NAME: "" });
    expect(config.port).toBe(8000);
    expect(config.databaseUrl).toBeUndefined();
    expect(config.databaseName).toBeUndefined();
  });

  it("leaves the database timeout unset unless configured", () => {
    expect(loadConfig({ DATABASE_TIMEOUT_MS: "" }).databaseTimeoutMs).toBeUndefined();
    expect(loadConfig({ DATABASE_TIMEOUT_MS: "30000" }).databaseTimeoutMs).toBe(30000);
    expect(() => loadConfig({ DATABASE_TIMEOUT_MS: "-1" })).toThrowError(/DATABASE_TIMEOUT_MS/);
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "http" })).toThrowError(ValidationError);
    expect(() => loadConfig({ PORT: "http" })).toThrowError(/^Invalid environment: PORT: /);
  });
});
