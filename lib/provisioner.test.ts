import { promises as fs } from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFakeHost, removeFakeHost, type FakeHost } from "../test/fakes";
import { Provisioner } from "./provisioner";

describe("Provisioner", () => {
  let host: FakeHost;
  let provisioner: Provisioner;

  beforeEach(async () => {
    host = await createFakeHost();
    provisioner = new Provisioner(host);
  });

  afterEach(async () => {
    await removeFakeHost(host);
  });

  describe("tooling", () => {
    it("installs Python from the deadsnakes PPA when missing", async () => {
      host.runner.missing.add("python3.11");

      expect(await provisioner.ensurePython()).toBe(true);
      expect(host.runner.lines()).toEqual([
        "apt-get update",
        "apt-get install -y software-properties-common",
        "add-apt-repository ppa:deadsnakes/ppa -y",
        "apt-get update",
        "apt-get install -y python3.11 python3.11-venv python3.11-dev",
      ]);
    });

    it("does nothing when everything is present", async () => {
      await provisioner.ensureInstanceTooling();

      expect(host.runner.calls).toHaveLength(0);
    });

    it("installs, enables and starts nginx", async () => {
      host.runner.missing.add("nginx");

      expect(await provisioner.ensureNginx()).toBe(true);
      expect(host.runner.lines()).toEqual(["apt-get update", "apt-get install -y nginx"]);
      expect(host.services.enabled.has("nginx")).toBe(true);
      expect(host.services.running.has("nginx")).toBe(true);
    });
  });

  describe("installHost", () => {
    it("sets up a fresh host", async () => {
      const { config } = host;
      host.runner.failWhen((line) => line === "id -u odoo", "id: 'odoo': no such user");

      await provisioner.installHost({ dbPassword: "test-secret" });

      const lines = host.runner.lines();
      expect(lines.slice(0, 3)).toEqual([
        "apt-get update",
        "apt-get upgrade -y",
        "apt-get install -y openssh-server fail2ban",
      ]);
      expect(lines.slice(4)).toEqual([
        "apt-get install -y postgresql",
        "id -u odoo",
        `adduser --system --home=${config.homeDir} --group odoo`,
        `chown -R odoo:odoo ${config.baseCodeDir}`,
      ]);
      expect(host.services.enabled.has("fail2ban")).toBe(true);
      expect(host.database.roles.get("odoo")).toEqual({ password: "test-secret", superuser: true });
      expect(host.sources.clones).toEqual([
        { repository: config.odooRepository, destination: config.baseCodeDir, branch: "18.0" },
      ]);
      expect(host.runtime.created).toEqual([path.join(config.homeDir, "venv")]);
    });

    it("skips every step that is already satisfied", async () => {
      const { config } = host;
      await host.database.createRole("odoo", "existing");
      await fs.mkdir(path.join(config.homeDir, "venv", "bin"), { recursive: true });
      await fs.writeFile(path.join(config.baseCodeDir, "odoo-bin"), "");
      await fs.writeFile(path.join(config.homeDir, "venv", "bin", "python"), "");

      await provisioner.installHost({ dbPassword: "test-secret" });

      expect(host.runner.lines().slice(4)).toEqual(["apt-get install -y postgresql", "id -u odoo"]);
      expect(host.database.roles.get("odoo")?.password).toBe("existing");
      expect(host.sources.clones).toEqual([]);
      expect(host.runtime.created).toEqual([]);
    });

    it("installs less and the report renderer when missing", async () => {
      host.runner.missing.add("lessc");
      host.runner.missing.add("wkhtmltopdf");

      await provisioner.installHost({ dbPassword: "test-secret" });

      const lines = host.runner.lines();
      expect(lines).toContain("apt-get install -y nodejs npm");
      expect(lines).toContain("npm install -g less less-plugin-clean-css");
      expect(lines).toContain(
        "apt-get install -y fontconfig libxrender1 libxext6 libfreetype6 libx11-6 xfonts-75dpi xfonts-base wkhtmltopdf"
      );
    });
  });
});
