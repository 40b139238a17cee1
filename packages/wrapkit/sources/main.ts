#!/usr/bin/env node
import { readFileSync } from "node:fs";

import { Argument, Command, Option } from "commander";

import { aliasCommand, aliasesCommand, unaliasCommand } from "./commands/alias.js";
import { blockCommand, blockedCommand, unblockCommand } from "./commands/blocklist.js";
import { commandRun } from "./commands/commandRun.js";
import { configMigrateCommand, configSetCommand, configShowCommand } from "./commands/config.js";
import { type LaunchCommandOptions, launchCommand } from "./commands/launch.js";
import { monitorCommand } from "./commands/monitor.js";
import { presetListCommand, presetRemoveCommand, presetSetCommand, presetShowCommand } from "./commands/preset.js";
import {
    profileCreateCommand,
    profileCurrentCommand,
    profileExportCommand,
    profileImportCommand,
    profileListCommand,
    profileSwitchCommand
} from "./commands/profile.js";
import { setOverrideCommand } from "./commands/setOverride.js";
import { wrapperScriptCommand } from "./commands/wrapperScript.js";
import { initLogging } from "./log.js";
import { FAILURE_MODES, LAUNCH_CHOICES, type LaunchChoice } from "./preferences/preferenceTypes.js";
import { isRecord } from "./util/isRecord.js";

const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));

const program = new Command();

initLogging();

program
    .name("wrapkit")
    .description("Launch simplified commands as native binaries or sandboxed application packages")
    .version(isRecord(pkg) && typeof pkg.version === "string" ? pkg.version : "0.0.0")
    .enablePositionalOptions();

program
    .command("launch")
    .description("Resolve and run a wrapper target")
    .argument("<name>", "Wrapper name or alias")
    .argument("[args...]", "Arguments passed to the application")
    .option("--interactive", "Treat this launch as interactive")
    .option("--desktop", "Treat this launch as a desktop launch (no prompts, no hooks)")
    .addOption(new Option("--choice <target>", "Use this target for one launch only").choices(LAUNCH_CHOICES))
    .addOption(new Option("--hook-failure <mode>", "Hook failure mode for this launch").choices(FAILURE_MODES))
    .passThroughOptions()
    .action((name: string, args: string[], options: LaunchCommandOptions) => commandRun(() => launchCommand(name, args, options)));

program
    .command("set-override")
    .description("Remember whether an app launches its system binary or package")
    .argument("<name>", "App name")
    .addArgument(new Argument("<target>", "system or package").choices(LAUNCH_CHOICES))
    .action((name: string, target: LaunchChoice) => commandRun(() => setOverrideCommand(name, target)));

program
    .command("alias")
    .description("Create an alias for a wrapper")
    .argument("<alias>", "Alias name")
    .argument("<target>", "Wrapper or alias it points to")
    .option("-f, --force", "Replace an existing alias or shadow a wrapper")
    .action((alias: string, target: string, options: { force?: boolean }) =>
        commandRun(() => aliasCommand(alias, target, options))
    );

program
    .command("unalias")
    .description("Remove an alias")
    .argument("<alias>", "Alias name")
    .action((alias: string) => commandRun(() => unaliasCommand(alias)));

program
    .command("aliases")
    .description("List aliases")
    .action(() => commandRun(() => aliasesCommand()));

const profile = program.command("profile").description("Manage configuration profiles");

profile
    .command("list")
    .description("List profiles")
    .action(() => commandRun(() => profileListCommand()));

profile
    .command("current")
    .description("Print the active profile")
    .action(() => commandRun(() => profileCurrentCommand()));

profile
    .command("create")
    .description("Create a profile")
    .argument("<name>", "Profile name")
    .option("--from <profile>", "Copy an existing profile")
    .action((name: string, options: { from?: string }) => commandRun(() => profileCreateCommand(name, options)));

profile
    .command("switch")
    .description("Make a profile active")
    .argument("<name>", "Profile name")
    .action((name: string) => commandRun(() => profileSwitchCommand(name)));

profile
    .command("export")
    .description("Write a profile to a file")
    .argument("<name>", "Profile name")
    .argument("<path>", "Destination inside the home directory")
    .action((name: string, destPath: string) => commandRun(() => profileExportCommand(name, destPath)));

profile
    .command("import")
    .description("Import a profile file under a new name")
    .argument("<name>", "New profile name")
    .argument("<path>", "Source file")
    .action((name: string, srcPath: string) => commandRun(() => profileImportCommand(name, srcPath)));

const preset = program.command("preset").description("Manage permission presets");

preset
    .command("list")
    .description("List presets")
    .action(() => commandRun(() => presetListCommand()));

preset
    .command("show")
    .description("Print a preset's permissions")
    .argument("<name>", "Preset name")
    .action((name: string) => commandRun(() => presetShowCommand(name)));

preset
    .command("set")
    .description("Create or replace a preset")
    .argument("<name>", "Preset name")
    .argument("<permissions...>", "Permission flags such as --share=network")
    .passThroughOptions()
    .action((name: string, permissions: string[]) => commandRun(() => presetSetCommand(name, permissions)));

preset
    .command("remove")
    .description("Remove a user preset")
    .argument("<name>", "Preset name")
    .action((name: string) => commandRun(() => presetRemoveCommand(name)));

program
    .command("block")
    .description("Add an identifier to the block-list")
    .argument("<id>", "Identifier")
    .action((id: string) => commandRun(() => blockCommand(id)));

program
    .command("unblock")
    .description("Remove an identifier from the block-list")
    .argument("<id>", "Identifier")
    .action((id: string) => commandRun(() => unblockCommand(id)));

program
    .command("blocked")
    .description("List blocked identifiers")
    .action(() => commandRun(() => blockedCommand()));

const config = program.command("config").description("Inspect and edit settings");

config
    .command("show")
    .description("Print the resolved settings for an app")
    .argument("<app>", "App name")
    .action((app: string) => commandRun(() => configShowCommand(app)));

config
    .command("set")
    .description("Set a key globally or for one app")
    .argument("<key>", "Setting key, e.g. launch_method")
    .argument("<value>", "Value; lists take words or JSON, scripts take a path or none")
    .option("--app <name>", "Set the key for this app only")
    .action((key: string, value: string, options: { app?: string }) =>
        commandRun(() => configSetCommand(key, value, options))
    );

config
    .command("migrate")
    .description("Upgrade stored profiles to the current schema")
    .action(() => commandRun(() => configMigrateCommand()));

program
    .command("wrapper-script")
    .description("Print the wrapper script for a package")
    .argument("<name>", "Wrapper name")
    .argument("<packageId>", "Package identifier")
    .action((name: string, packageId: string) => commandRun(() => wrapperScriptCommand(name, packageId)));

program
    .command("monitor")
    .description("Watch package exports and trigger regeneration")
    .option("--exec <script>", "Script run for each batch of changes")
    .action((options: { exec?: string }) => commandRun(() => monitorCommand(options)));

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

await program.parseAsync(process.argv);
