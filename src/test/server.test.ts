import { describe, it } from "node:test";
import assert from "node:assert";
import { CliOptions, createProgram, toOverrides } from "../server";
import { loadConfig } from "../services/config";

function parse(args: string[]): CliOptions {
  return createProgram().parse(args, { from: "user" }).opts<CliOptions>();
}

describe("CLI options", () => {
  it("maps flags onto config keys", () => {
    const config = loadConfig(
      toOverrides(parse(["--db", "data/app.duckdb", "-p", "8081", "--workers", "6", "--cache", "none"])),
      {}
    );
    assert.strictEqual(config.dbPath, "data/app.duckdb");
    assert.strictEqual(config.port, 8081);
    assert.strictEqual(config.maxWorkers, 6);
    assert.strictEqual(config.cache, "none");
  });

  it("collects repeated and comma-separated extensions", () => {
    const options = parse(["-e", "spatial,httpfs", "--extension", "h3:community"]);
    assert.deepStrictEqual(options.extension, ["spatial", "httpfs", "h3:community"]);
  });

  it("leaves unset flags to the environment", () => {
    const config = loadConfig(toOverrides(parse([])), { DUCKDB_GATEWAY_PORT: "7000" });
    assert.strictEqual(config.port, 7000);
  });
});
