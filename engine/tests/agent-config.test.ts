/**
 * WinProv Engine — Agent Config Installer Tests
 *
 * The service restart goes through a recording runner; nothing is executed.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import {
  buildRestartCommand,
  installConfig,
  type CommandRunner,
} from "../src/agent-config";
import { ConfigInstallError } from "../src/errors";
import { createLogger } from "../src/utils/logger";

const logger = createLogger({ level: "silent" });

let testDir: string;

function recordingRunner(): { runner: CommandRunner; commands: string[] } {
  const commands: string[] = [];
  const runner: CommandRunner = async (command) => {
    commands.push(command);
    return { stdout: "", stderr: "" };
  };
  return { runner, commands };
}

beforeEach(() => {
  testDir = fs.mkdtempSync(path.join(os.tmpdir(), "winprov-agent-"));
});

afterEach(() => {
  fs.rmSync(testDir, { recursive: true, force: true });
});

describe("buildRestartCommand", () => {
  it("restarts the service through PowerShell", () => {
    expect(buildRestartCommand("AmazonCloudWatchAgent")).toBe(
      `powershell -NoProfile -Command "Restart-Service -Name 'AmazonCloudWatchAgent' -Force"`,
    );
  });

  it("escapes single quotes in the service name", () => {
    expect(buildRestartCommand("O'Agent")).toBe(
      `powershell -NoProfile -Command "Restart-Service -Name 'O''Agent' -Force"`,
    );
  });
});

describe("installConfig", () => {
  it("copies the file, overwriting the destination, then restarts", async () => {
    const source = path.join(testDir, "agent.json");
    const dest = path.join(testDir, "ProgramData", "agent", "config.json");
    fs.writeFileSync(source, '{"metrics":{}}');
    fs.mkdirSync(path.dirname(dest), { recursive: true });
    fs.writeFileSync(dest, "old");
    const { runner, commands } = recordingRunner();

    const result = await installConfig(source, {
      destinationPath: dest,
      serviceName: "TestAgent",
      runner,
      logger,
    });

    expect(fs.readFileSync(dest, "utf-8")).toBe('{"metrics":{}}');
    expect(result.destinationPath).toBe(dest);
    expect(result.serviceName).toBe("TestAgent");
    expect(result.bytesCopied).toBe(14);
    expect(commands).toEqual([buildRestartCommand("TestAgent")]);
  });

  it("creates the destination directory", async () => {
    const source = path.join(testDir, "agent.json");
    const dest = path.join(testDir, "new", "dir", "config.json");
    fs.writeFileSync(source, "{}");

    await installConfig(source, {
      destinationPath: dest,
      runner: recordingRunner().runner,
      logger,
    });

    expect(fs.existsSync(dest)).toBe(true);
  });

  it("fails before touching anything when the source is missing", async () => {
    const dest = path.join(testDir, "config.json");
    const { runner, commands } = recordingRunner();

    await expect(
      installConfig(path.join(testDir, "missing.json"), {
        destinationPath: dest,
        runner,
        logger,
      }),
    ).rejects.toBeInstanceOf(ConfigInstallError);

    expect(fs.existsSync(dest)).toBe(false);
    expect(commands).toEqual([]);
  });

  it("reports a failed restart", async () => {
    const source = path.join(testDir, "agent.json");
    fs.writeFileSync(source, "{}");
    const runner: CommandRunner = async () => {
      throw new Error("Cannot find any service with service name 'TestAgent'.");
    };

    await expect(
      installConfig(source, {
        destinationPath: path.join(testDir, "config.json"),
        serviceName: "TestAgent",
        runner,
        logger,
      }),
    ).rejects.toThrow(
      `Config installed but restarting "TestAgent" failed: Cannot find any service with service name 'TestAgent'.`,
    );
  });
});
