import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FakeRunner } from "../test/fakes";
import { parseSystemctlShow, renderUnit, SystemctlManager } from "./systemctl";

const definition = {
  description: "Odoo18 - demo",
  user: "odoo",
  workingDirectory: "/odoo",
  execStart: ["/odoo/instances/demo/venv/bin/python", "/odoo/odoo-bin", "-c", "/etc/odoo-demo.conf"],
};

describe("renderUnit", () => {
  it("renders a simple restart-on-failure service", () => {
    expect(renderUnit(definition)).toBe(`[Unit]
Description=Odoo18 - demo
After=network.target

[Service]
Type=simple
User=odoo
Group=odoo
ExecStart=/odoo/instances/demo/venv/bin/python /odoo/odoo-bin -c /etc/odoo-demo.conf
WorkingDirectory=/odoo
StandardOutput=journal+console
Restart=on-failure

[Install]
WantedBy=multi-user.target
`);
  });

  it("refuses values that would inject extra directives", () => {
    expect(() => renderUnit({ ...definition, description: "demo\nExecStartPre=/bin/true" })).toThrow(
      "Unit description must be a single line"
    );
  });
});

describe("parseSystemctlShow", () => {
  it("splits on the first equals sign only", () => {
    expect(parseSystemctlShow("LoadState=loaded\nDescription=a=b\n\n")).toEqual({
      LoadState: "loaded",
      Description: "a=b",
    });
  });
});

describe("SystemctlManager", () => {
  let root: string;
  let runner: FakeRunner;
  let manager: SystemctlManager;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "odoo-systemd-"));
    runner = new FakeRunner();
    manager = new SystemctlManager(runner);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("installs a unit file and reloads the daemon", async () => {
    const unitFile = path.join(root, "odoo-demo.service");

    await manager.installUnit(unitFile, definition);

    expect(await fs.readFile(unitFile, "utf-8")).toBe(renderUnit(definition));
    expect(runner.lines()).toEqual(["systemctl daemon-reload"]);
  });

  it("removes a unit file only when it exists", async () => {
    const unitFile = path.join(root, "odoo-demo.service");

    expect(await manager.removeUnit(unitFile)).toBe(false);
    expect(runner.calls).toHaveLength(0);

    await fs.writeFile(unitFile, "");
    expect(await manager.removeUnit(unitFile)).toBe(true);
    expect(runner.lines()).toEqual(["systemctl daemon-reload"]);
  });

  it("surfaces errors other than a missing unit file", async () => {
    const blocker = path.join(root, "not-a-dir");
    await fs.writeFile(blocker, "");

    await expect(manager.removeUnit(path.join(blocker, "odoo-demo.service"))).rejects.toMatchObject({ code: "ENOTDIR" });
    expect(runner.calls).toHaveLength(0);
  });

  it("checks the load state", async () => {
    runner.respond((command, args) =>
      args.includes("odoo-demo.service") ? { stdout: "loaded\n", stderr: "" } : { stdout: "not-found\n", stderr: "" }
    );

    expect(await manager.isLoaded("odoo-demo.service")).toBe(true);
    expect(await manager.isLoaded("odoo-ghost.service")).toBe(false);
    expect(runner.lines()[0]).toBe("systemctl show -p LoadState --value odoo-demo.service");
  });

  it("maps show output to a unit status", async () => {
    runner.respond(() => ({
      stdout: "LoadState=loaded\nActiveState=active\nUnitFileState=enabled\nDescription=Odoo18 - demo\nMainPID=4242\n",
      stderr: "",
    }));

    expect(await manager.getStatus("odoo-demo.service")).toEqual({
      unit: "odoo-demo.service",
      loaded: true,
      active: "active",
      enabled: true,
      description: "Odoo18 - demo",
      mainPid: 4242,
    });
  });

  it("reports unknown states and omits an idle main PID", async () => {
    runner.respond(() => ({
      stdout: "LoadState=not-found\nActiveState=maintenance\nUnitFileState=\nDescription=\nMainPID=0\n",
      stderr: "",
    }));

    expect(await manager.getStatus("odoo-ghost.service")).toEqual({
      unit: "odoo-ghost.service",
      loaded: false,
      active: "unknown",
      enabled: false,
      description: "",
    });
  });

  it("drives unit state through systemctl", async () => {
    await manager.enable("odoo-demo.service");
    await manager.start("odoo-demo.service");
    await manager.restart("odoo-demo.service");
    await manager.stop("odoo-demo.service");
    await manager.disable("odoo-demo.service");

    expect(runner.lines()).toEqual([
      "systemctl enable odoo-demo.service",
      "systemctl start odoo-demo.service",
      "systemctl restart odoo-demo.service",
      "systemctl stop odoo-demo.service",
      "systemctl disable odoo-demo.service",
    ]);
  });
});
