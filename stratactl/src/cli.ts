#!/usr/bin/env node

import { Command, Option } from "commander";
import { createBackup, listBackups, restoreBackup } from "./commands/backup.js";
import type { GlobalOptions } from "./commands/context.js";
import { diffEnvironments, listEnvironments, newEnvironment, removeEnvironment, useEnvironment } from "./commands/environments.js";
import { EXIT } from "./commands/exit-codes.js";
import { init } from "./commands/init.js";
import { listModules, registerModule, unregisterModule } from "./commands/modules.js";
import type { CommandResult } from "./commands/result.js";
import { getSettings, resetSettings, setSettings } from "./commands/settings.js";
import { exportStore, importStore } from "./commands/transfer.js";
import { validate } from "./commands/validate.js";
import { watch } from "./commands/watch.js";

type Format = "human" | "jsonl";
type ProgramOptions = { store?: string; profile?: string; configDir?: string; format: Format };

const program = new Command();

program
  .name("stratactl")
  .description("Layered configuration store: modules, environments, backups")
  .version("0.1.0")
  .option("--store <path>", "Path to the store file (default: platform store path)")
  .option("--profile <name>", "Settings profile: loads config/<name>.yaml over base.yaml")
  .option("--config-dir <path>", "Directory holding stratactl settings YAML")
  .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"));

function globals(): { opts: GlobalOptions; format: Format } {
  const o = program.opts<ProgramOptions>();
  return { opts: { store: o.store, profile: o.profile, configDir: o.configDir }, format: o.format };
}

/** JSON lines or human text; a failed result exits with its exit code. */
function finish<T>(format: Format, res: CommandResult<T>, human: (value: T) => void): void {
  if (!res.ok) {
    if (format === "jsonl") {
      process.stdout.write(JSON.stringify(res.error) + "\n");
    } else {
      console.error(res.error.message);
    }
    process.exit(res.exitCode);
  }

  if (format === "jsonl") {
    process.stdout.write(JSON.stringify(res.value) + "\n");
  } else {
    human(res.value);
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

program
  .command("init")
  .description("Create the store file if it does not exist")
  .action(async () => {
    const { opts, format } = globals();
    finish(format, await init(opts), (v) => {
      console.log(v.created ? `Created ${v.storePath}` : `Store already exists: ${v.storePath}`);
    });
  });

program
  .command("modules")
  .description("List registered modules")
  .action(async () => {
    const { opts, format } = globals();
    finish(format, await listModules(opts), (list) => {
      if (list.length === 0) {
        console.log("No modules registered.");
        return;
      }
      for (const m of list) console.log(`${m.name}  ${m.properties} properties  ${m.description ?? ""}`.trimEnd());
    });
  });

program
  .command("register")
  .description("Register a module with a schema file (JSON or YAML)")
  .argument("<module>", "Module name")
  .argument("<schemaFile>", "Module schema file")
  .option("--defaults <file>", "Defaults file layered over the schema defaults")
  .option("--description <text>", "Module description")
  .action(async (module: string, schemaFile: string, o: { defaults?: string; description?: string }) => {
    const { opts, format } = globals();
    const res = await registerModule(opts, { module, schemaFile, defaultsFile: o.defaults, description: o.description });
    finish(format, res, (entry) => console.log(`Registered ${entry.name}`));
  });

program
  .command("unregister")
  .description("Remove a module, its schema and every environment's settings for it")
  .argument("<module>", "Module name")
  .action(async (module: string) => {
    const { opts, format } = globals();
    finish(format, await unregisterModule(opts, module), (v) => console.log(`Unregistered ${v.module}`));
  });

program
  .command("get")
  .description("Show a module's effective settings")
  .argument("<module>", "Module name")
  .argument("[key]", "Dotted key inside the settings")
  .option("--env <name>", "Environment (default: current)")
  .option("--expand", "Expand ${env:NAME}, ${home}, ${platform} and ${storeDir}")
  .option("--show-secrets", "Do not redact secret-looking values")
  .action(
    async (module: string, key: string | undefined, o: { env?: string; expand?: boolean; showSecrets?: boolean }) => {
      const { opts, format } = globals();
      const res = await getSettings(opts, {
        module,
        key,
        environment: o.env,
        expand: o.expand,
        showSecrets: o.showSecrets,
      });
      finish(format, res, (value) => {
        if (typeof value === "string") console.log(value);
        else printJson(value);
      });
    },
  );

program
  .command("set")
  .description("Set module settings in an environment: key=value (values parse as JSON when they can)")
  .argument("<module>", "Module name")
  .argument("<assignments...>", "key=value pairs; dotted keys reach into objects")
  .option("--env <name>", "Environment (default: current)")
  .option("--replace", "Replace the environment's overlay instead of merging into it")
  .option("--no-validate", "Skip schema validation")
  .option("--show-secrets", "Do not redact secret-looking values")
  .action(
    async (
      module: string,
      assignments: string[],
      o: { env?: string; replace?: boolean; validate: boolean; showSecrets?: boolean },
    ) => {
      const { opts, format } = globals();
      const res = await setSettings(opts, {
        module,
        assignments,
        environment: o.env,
        replace: o.replace,
        validate: o.validate,
        showSecrets: o.showSecrets,
      });
      finish(format, res, (value) => printJson(value));
    },
  );

program
  .command("reset")
  .description("Drop an environment's overlay so the module falls back to its defaults")
  .argument("<module>", "Module name")
  .option("--env <name>", "Environment (default: current)")
  .option("--show-secrets", "Do not redact secret-looking values")
  .action(async (module: string, o: { env?: string; showSecrets?: boolean }) => {
    const { opts, format } = globals();
    const res = await resetSettings(opts, { module, environment: o.env, showSecrets: o.showSecrets });
    finish(format, res, (value) => printJson(value));
  });

program
  .command("validate")
  .description("Validate effective settings against module schemas")
  .argument("[module]", "Module name (default: all modules)")
  .option("--env <name>", "Environment (default: current)")
  .action(async (module: string | undefined, o: { env?: string }) => {
    const { opts, format } = globals();
    const res = await validate(opts, { module, environment: o.env });
    finish(format, res, (report) => {
      const count = Object.keys(report.results).length;
      console.log(`OK (${count} module${count === 1 ? "" : "s"} in ${report.environment})`);
    });
  });

const env = program.command("env").description("Manage environments");

env
  .command("list")
  .description("List environments")
  .action(async () => {
    const { opts, format } = globals();
    finish(format, await listEnvironments(opts), (list) => {
      for (const e of list) console.log(`${e.current ? "*" : " "} ${e.name}  ${e.description}`.trimEnd());
    });
  });

env
  .command("new")
  .description("Create an environment")
  .argument("<name>", "Environment name")
  .option("--description <text>", "Description")
  .option("--copy-from <name>", "Copy settings from another environment")
  .option("--use", "Switch to it afterwards")
  .action(async (name: string, o: { description?: string; copyFrom?: string; use?: boolean }) => {
    const { opts, format } = globals();
    const res = await newEnvironment(opts, { name, description: o.description, copyFrom: o.copyFrom, use: o.use });
    finish(format, res, (e) => console.log(`Created environment ${e.name}`));
  });

env
  .command("use")
  .description("Switch the current environment")
  .argument("<name>", "Environment name")
  .action(async (name: string) => {
    const { opts, format } = globals();
    finish(format, await useEnvironment(opts, name), (v) => console.log(`Switched ${v.from} -> ${v.to}`));
  });

env
  .command("rm")
  .description("Remove an environment (not default, not current)")
  .argument("<name>", "Environment name")
  .action(async (name: string) => {
    const { opts, format } = globals();
    finish(format, await removeEnvironment(opts, name), (v) => console.log(`Removed environment ${v.removed}`));
  });

program
  .command("diff")
  .description("Compare effective settings of two environments")
  .argument("<left>", "Environment")
  .argument("<right>", "Environment")
  .option("--module <name>", "Only this module")
  .option("--show-secrets", "Do not redact secret-looking values")
  .action(async (left: string, right: string, o: { module?: string; showSecrets?: boolean }) => {
    const { opts, format } = globals();
    const res = await diffEnvironments(opts, { left, right, module: o.module, showSecrets: o.showSecrets });
    finish(format, res, (diff) => {
      const modules = Object.keys(diff);
      if (modules.length === 0) {
        console.log("No differences.");
        return;
      }
      for (const m of modules) {
        for (const d of diff[m]) {
          console.log(`${m}.${d.path}  ${d.kind}  ${JSON.stringify(d.left)} -> ${JSON.stringify(d.right)}`);
        }
      }
    });
  });

program
  .command("backup")
  .description("Back up the store file")
  .option("--reason <text>", "Short reason, kept in the backup name")
  .action(async (o: { reason?: string }) => {
    const { opts, format } = globals();
    finish(format, await createBackup(opts, o.reason), (b) => console.log(b.path));
  });

program
  .command("backups")
  .description("List backups, newest first")
  .action(async () => {
    const { opts, format } = globals();
    finish(format, await listBackups(opts), (list) => {
      if (list.length === 0) {
        console.log("No backups found.");
        return;
      }
      for (const b of list) console.log(`${b.name}  ${b.createdAt}`);
    });
  });

program
  .command("restore")
  .description("Restore the store from a backup (name or path)")
  .argument("<backup>", "Backup file name or path")
  .option("--no-backup-current", "Do not back up the current store first")
  .action(async (backup: string, o: { backupCurrent: boolean }) => {
    const { opts, format } = globals();
    finish(format, await restoreBackup(opts, { backup, backupCurrent: o.backupCurrent }), (v) =>
      console.log(`Restored ${v.restored}${v.safetyBackup ? ` (previous store saved as ${v.safetyBackup})` : ""}`),
    );
  });

program
  .command("export")
  .description("Export modules, schemas and environments to JSON or YAML")
  .argument("<file>", "Output file (.json, .yaml or .yml)")
  .addOption(new Option("--as <format>", "Output format (default: from extension)").choices(["json", "yaml"]))
  .option("--module <name>", "Only this module (repeatable)", collect, [])
  .option("--env <name>", "Only this environment (repeatable)", collect, [])
  .option("--no-schemas", "Leave schemas out")
  .action(
    async (file: string, o: { as?: "json" | "yaml"; module: string[]; env: string[]; schemas: boolean }) => {
      const { opts, format } = globals();
      const res = await exportStore(opts, {
        file,
        format: o.as,
        modules: o.module,
        environments: o.env,
        includeSchemas: o.schemas,
      });
      finish(format, res, (v) => console.log(`Exported ${v.modules.length} module(s) to ${v.file}`));
    },
  );

program
  .command("import")
  .description("Import an export bundle")
  .argument("<file>", "Bundle file (.json, .yaml or .yml)")
  .addOption(new Option("--mode <mode>", "merge into or replace the store").choices(["merge", "replace"]).default("merge"))
  .option("--no-validate", "Skip schema validation")
  .option("--no-backup", "Do not back up the store first")
  .action(async (file: string, o: { mode: "merge" | "replace"; validate: boolean; backup: boolean }) => {
    const { opts, format } = globals();
    const res = await importStore(opts, { file, mode: o.mode, validate: o.validate, backupFirst: o.backup });
    finish(format, res, (v) => console.log(`Imported ${v.modules.length} module(s) (${v.mode})`));
  });

program
  .command("watch")
  .description("Hot-reload the store and print events until interrupted")
  .action(async () => {
    const { opts, format } = globals();
    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());
    process.once("SIGTERM", () => controller.abort());

    const res = await watch(opts, {
      signal: controller.signal,
      onEvent: (event) => {
        if (format === "jsonl") process.stdout.write(JSON.stringify(event) + "\n");
        else console.log(`${event.timestamp}  ${event.event}  ${JSON.stringify(event.data)}`);
      },
    });
    finish(format, res, (v) => console.log(`Stopped watching ${v.storePath} (${v.events} events)`));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILURE);
});
