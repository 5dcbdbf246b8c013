import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Writable } from "node:stream";
import { ADVISORY_FALLBACK } from "../../src/cleaning/advisory.js";
import { parseConfig } from "../../src/config/schema.js";
import { USER_MESSAGES } from "../../src/errors/messages.js";

// Helper to capture stdout
function captureStdout(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      buf += chunk.toString();
      cb();
    },
  });
  return { stream, output: () => buf };
}

const PEOPLE_CSV = "id,name\n1,ann\n2,bob\n2,bob\n";

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), "datawise-cli-test-"));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

function writeTemp(name: string, content: string): string {
  const path = join(tempDir, name);
  writeFileSync(path, content);
  return path;
}

describe("CLI: ConfigValidateCommand", () => {
  it("validates a correct config file", async () => {
    const configPath = writeTemp("valid.json", JSON.stringify({ telegram: { maxFileSizeMb: 5 } }));

    const { ConfigValidateCommand } = await import("../../src/cli/commands/config-cmd.js");
    const cmd = new ConfigValidateCommand();
    cmd.configFile = configPath;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    expect(await cmd.execute()).toBe(0);
    expect(output()).toBe(`Config is valid: ${configPath}\n`);
  });

  it("rejects an invalid config file", async () => {
    const configPath = writeTemp("invalid.json", JSON.stringify({ ollama: { maxRetries: "x" } }));

    const { ConfigValidateCommand } = await import("../../src/cli/commands/config-cmd.js");
    const cmd = new ConfigValidateCommand();
    cmd.configFile = configPath;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    expect(await cmd.execute()).toBe(1);
    expect(output().split("\n")[0]).toBe(`Config is INVALID: ${configPath}`);
  });

  it("reports missing config file", async () => {
    const { ConfigValidateCommand } = await import("../../src/cli/commands/config-cmd.js");
    const cmd = new ConfigValidateCommand();
    cmd.configFile = join(tempDir, "nonexistent.json");
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    expect(await cmd.execute()).toBe(1);
    expect(output()).toBe(`Config file not found: ${cmd.configFile}\n`);
  });
});

describe("CLI: ConfigShowCommand", () => {
  it("shows config with the bot token redacted", async () => {
    const configPath = writeTemp("with-token.json", JSON.stringify({ telegram: { token: "test-secret" } }));

    const { ConfigShowCommand, REDACTED } = await import("../../src/cli/commands/config-cmd.js");
    const cmd = new ConfigShowCommand();
    cmd.configFile = configPath;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    expect(await cmd.execute()).toBe(0);
    const parsed: unknown = JSON.parse(output());
    expect(parsed).toMatchObject({ telegram: { token: REDACTED, maxFileSizeMb: 10 } });
  });

  it("leaves a config without a token unchanged", async () => {
    const { redactConfig } = await import("../../src/cli/commands/config-cmd.js");
    const config = parseConfig({});
    expect(redactConfig(config)).toBe(config);
  });
});

describe("CLI: CleanCommand", () => {
  it("writes the cleaned file beside the input and prints the report", async () => {
    const file = writeTemp("people.csv", PEOPLE_CSV);

    const { CleanCommand } = await import("../../src/cli/commands/clean.js");
    const cmd = new CleanCommand();
    cmd.file = file;
    cmd.output = undefined;
    cmd.ai = false;
    cmd.rules = undefined;
    cmd.config = join(tempDir, "none.json");
    cmd.verbose = false;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    expect(await cmd.execute()).toBe(0);
    const target = join(tempDir, "cleaned_people.csv");
    expect(readFileSync(target, "utf8")).toBe("id,name\n1,ann\n2,bob\n");
    expect(output()).toBe(
      [
        ADVISORY_FALLBACK,
        "",
        "ACTUAL CLEANING PERFORMED:",
        "Removed 1 duplicate rows",
        "",
        "RESULTS:",
        "Original dataset: 3 rows × 2 columns",
        "Cleaned dataset: 2 rows × 2 columns",
        "",
        `Cleaned file written to ${target}`,
        "",
      ].join("\n"),
    );
  });

  it("applies a rule file and honours --output", async () => {
    const file = writeTemp("people.csv", "id,name\n1,ann\n2,\n");
    const rules = writeTemp(
      "rules.json",
      JSON.stringify({ rules: [{ column: "name", type: "fill_missing", parameters: { value: "n/a yet" } }] }),
    );
    const target = join(tempDir, "out.csv");

    const { CleanCommand } = await import("../../src/cli/commands/clean.js");
    const cmd = new CleanCommand();
    cmd.file = file;
    cmd.output = target;
    cmd.ai = false;
    cmd.rules = rules;
    cmd.config = join(tempDir, "none.json");
    cmd.verbose = false;
    const { stream } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    expect(await cmd.execute()).toBe(0);
    expect(readFileSync(target, "utf8")).toBe("id,name\n1,ann\n2,n/a yet\n");
  });

  it("prints the friendly error for an unreadable file", async () => {
    const file = writeTemp("notes.txt", "hello");

    const { CleanCommand } = await import("../../src/cli/commands/clean.js");
    const cmd = new CleanCommand();
    cmd.file = file;
    cmd.output = undefined;
    cmd.ai = false;
    cmd.rules = undefined;
    cmd.config = join(tempDir, "none.json");
    cmd.verbose = false;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    expect(await cmd.execute()).toBe(1);
    expect(output()).toBe(
      `Error: ${USER_MESSAGES.unreadable_input}\n  Unsupported file format: .txt\n`,
    );
  });
});

describe("CLI: ProfileCommand", () => {
  it("prints the dataset summary", async () => {
    const file = writeTemp("people.csv", PEOPLE_CSV);

    const { ProfileCommand } = await import("../../src/cli/commands/profile.js");
    const cmd = new ProfileCommand();
    cmd.file = file;
    cmd.config = join(tempDir, "none.json");
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    expect(await cmd.execute()).toBe(0);
    expect(output()).toBe(
      [
        "Dataset Summary:",
        "Shape: 3 rows × 2 columns",
        "Found 1 duplicate rows",
        "",
        "Columns:",
        "- id (integer), nulls=0, min=1, max=2, mean=1.6667, std=0.5774, median=2",
        "- name (string), nulls=0, mode=bob (x2)",
        "",
      ].join("\n"),
    );
  });
});

describe("CLI: ValidateCommand", () => {
  it("accepts a conforming file", async () => {
    const file = writeTemp("people.csv", PEOPLE_CSV);
    const schema = writeTemp(
      "schema.json",
      JSON.stringify({ requiredColumns: ["id", "name"], columns: [{ name: "id", dataType: "integer" }] }),
    );

    const { ValidateCommand } = await import("../../src/cli/commands/validate.js");
    const cmd = new ValidateCommand();
    cmd.file = file;
    cmd.schema = schema;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    expect(await cmd.execute()).toBe(0);
    expect(output()).toBe("Data is valid: people.csv\n");
  });

  it("lists each violation", async () => {
    const file = writeTemp("people.csv", PEOPLE_CSV);
    const schema = writeTemp(
      "schema.json",
      JSON.stringify({ requiredColumns: ["email"], columns: [{ name: "id", dataType: "integer", unique: true }] }),
    );

    const { ValidateCommand } = await import("../../src/cli/commands/validate.js");
    const cmd = new ValidateCommand();
    cmd.file = file;
    cmd.schema = schema;
    const { stream, output } = captureStdout();
    cmd.context = { ...cmd.context, stdout: stream };

    expect(await cmd.execute()).toBe(1);
    expect(output()).toBe(
      [
        "Data is INVALID: people.csv",
        "  - Missing required columns: email",
        "  - Column id should be unique but contains duplicates",
        "",
      ].join("\n"),
    );
  });
});
