import { describe, expect, it } from "vitest";
import { ExternalToolError } from "./errors";
import { formatCommand, ProcessRunner } from "./exec";

describe("formatCommand", () => {
  it("leaves plain arguments bare and quotes the rest", () => {
    expect(formatCommand("apt-get", ["install", "-y", "python3.11-venv"])).toBe("apt-get install -y python3.11-venv");
    expect(formatCommand("sh", ["-c", "echo it's"])).toBe("sh -c 'echo it'\\''s'");
  });
});

describe("ProcessRunner", () => {
  const runner = new ProcessRunner();

  it("captures stdout and stderr", async () => {
    const result = await runner.run("sh", ["-c", "echo out; echo err >&2"]);

    expect(result).toEqual({ stdout: "out\n", stderr: "err\n" });
  });

  it("feeds input to stdin", async () => {
    const { stdout } = await runner.run("cat", [], { input: "SELECT 1;" });

    expect(stdout).toBe("SELECT 1;");
  });

  it("runs in the requested working directory", async () => {
    const { stdout } = await runner.run("pwd", [], { cwd: "/" });

    expect(stdout).toBe("/\n");
  });

  it("rejects with the exit status and stderr", async () => {
    const failure = runner.run("sh", ["-c", "echo broken >&2; exit 3"]);

    await expect(failure).rejects.toBeInstanceOf(ExternalToolError);
    await expect(failure).rejects.toMatchObject({
      status: 3,
      stderr: "broken\n",
      message: "sh -c 'echo broken >&2; exit 3' exited with code 3: broken",
    });
  });

  it("rejects with the exit status when the command exits before reading its input", async () => {
    const failure = runner.run("sh", ["-c", "exit 3"], { input: "x".repeat(4 * 1024 * 1024) });

    await expect(failure).rejects.toBeInstanceOf(ExternalToolError);
    await expect(failure).rejects.toMatchObject({ status: 3 });
  });

  it("kills commands that run past the timeout", async () => {
    await expect(runner.run("sleep", ["5"], { timeoutMs: 50 })).rejects.toMatchObject({
      status: null,
      message: "sleep 5 did not complete: timed out after 50ms",
    });
  });

  it("rejects when the executable does not exist", async () => {
    await expect(runner.run("odoo-host-no-such-command", [])).rejects.toBeInstanceOf(ExternalToolError);
  });

  it("answers commandExists", async () => {
    expect(await runner.commandExists("sh")).toBe(true);
    expect(await runner.commandExists("odoo-host-no-such-command")).toBe(false);
  });
});
