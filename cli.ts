#!/usr/bin/env tsx
import "dotenv/config";
import bcrypt from "bcryptjs";
import inquirer from "inquirer";
import { parseArgs } from "util";

import { loadConfig } from "./lib/config";
import { createStore, openDatabase, type Store } from "./lib/db";
import { errorMessage, HostError, NotFoundError, ValidationError } from "./lib/errors";
import { createHostEnvironment } from "./lib/host";
import { InstanceManager } from "./lib/lifecycle";
import { Provisioner } from "./lib/provisioner";
import { validateDomain, validateEmail, validateName } from "./lib/registry";
import { formatCreatedInstance, formatInstanceList, formatRemovalReport, formatStatus } from "./lib/report";

const USAGE = `Usage: odoo-host <command> [options]

Commands:
  list                              List registered instances
  create                            Create an instance (interactive)
  remove [name] [--yes] [--force]   Remove an instance
  status <name>                     Show service state and ports
  install-host                      Prepare this server for Odoo 18
  add-user <username>               Add a control server operator`;

async function promptCreate() {
  return inquirer.prompt<{ name: string; domain: string; enterprise: boolean; ssl: boolean; email?: string }>([
    {
      type: "input",
      name: "name",
      message: "Instance name (letters, numbers, underscores, dashes):",
      validate: (input: string) => validateName(input) || "Only letters, numbers, underscores, and dashes are allowed.",
    },
    {
      type: "input",
      name: "domain",
      message: "Domain (e.g. odoo.example.com):",
      validate: (input: string) => validateDomain(input) || "Enter a valid domain",
    },
    {
      type: "confirm",
      name: "enterprise",
      message: "Include Odoo Enterprise addons?",
      default: false,
    },
    {
      type: "confirm",
      name: "ssl",
      message: "Request an SSL certificate with Certbot?",
      default: false,
    },
    {
      type: "input",
      name: "email",
      message: "Email for the SSL certificate:",
      when: (answers: { ssl: boolean }) => answers.ssl,
      validate: (input: string) => validateEmail(input) || "Enter a valid email address",
    },
  ]);
}

async function selectInstance(manager: InstanceManager): Promise<string> {
  const names = await manager.registry.requireInstances();
  console.log(formatInstanceList(names));

  const { index } = await inquirer.prompt<{ index: string }>([{
    type: "input",
    name: "index",
    message: "Enter the number of the instance you want to delete:",
  }]);
  const trimmed = index.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new NotFoundError("Invalid selection.");
  }
  return manager.registry.select(Number(trimmed));
}

async function confirmRemoval(name: string): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([{
    type: "confirm",
    name: "confirmed",
    message: `Are you sure you want to delete the instance '${name}'? This action cannot be undone.`,
    default: false,
  }]);
  return confirmed;
}

async function addUser(store: Store, username: string) {
  if (store.getUserByUsername(username)) {
    throw new ValidationError(`User '${username}' already exists`);
  }

  const { password } = await inquirer.prompt<{ password: string }>([{
    type: "password",
    name: "password",
    mask: "*",
    message: `Password for '${username}':`,
    validate: (input: string) => input.length >= 6 || "Password must be at least 6 characters long",
  }]);

  store.createUser(username, bcrypt.hashSync(password, 10));
  console.log(`User '${username}' created.`);
}

async function main(argv: string[]) {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      yes: { type: "boolean", short: "y", default: false },
      force: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  const [command, target] = positionals;

  if (!command || values.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const store = createStore(openDatabase(config.dbPath));
  const host = createHostEnvironment(config);
  const manager = new InstanceManager(host, store);

  switch (command) {
    case "list": {
      console.log(formatInstanceList(await manager.list()));
      break;
    }

    case "create": {
      const answers = await promptCreate();
      const instance = await manager.create(answers);
      console.log(formatCreatedInstance(instance));
      break;
    }

    case "remove": {
      let name: string;
      if (!target) {
        name = await selectInstance(manager);
      } else if (values.force) {
        name = target;
      } else {
        name = await manager.resolveRegistered(target);
      }
      const report = await manager.remove(name, {
        confirm: values.yes ? () => true : confirmRemoval,
      });
      console.log(formatRemovalReport(report));
      break;
    }

    case "status": {
      if (!target) throw new ValidationError("Usage: odoo-host status <name>");
      console.log(formatStatus(await manager.status(target)));
      break;
    }

    case "install-host": {
      const { dbPassword } = await inquirer.prompt<{ dbPassword: string }>([{
        type: "password",
        name: "dbPassword",
        mask: "*",
        message: `Enter the password for the PostgreSQL user '${config.serviceUser}':`,
        validate: (input: string) => input.length > 0 || "A password is required",
      }]);
      await new Provisioner(host).installHost({ dbPassword });
      break;
    }

    case "add-user": {
      if (!target) throw new ValidationError("Usage: odoo-host add-user <username>");
      await addUser(store, target);
      break;
    }

    default:
      throw new ValidationError(`Unknown command '${command}'\n\n${USAGE}`);
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(error instanceof HostError ? error.exitCode : 1);
});
