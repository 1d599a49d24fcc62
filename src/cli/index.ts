#!/usr/bin/env tsx

/**
 * CLI entry point for il2cpp-dump
 * Handles command-line argument parsing
 */

import { Command } from "commander";
import { NAME, VERSION } from "./banner";
import { dumpCommand } from "./commands/dump";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name(NAME)
  .description(
    "Render a reconstructed IL2CPP type model as C# sources, a Visual Studio solution and an IDA script",
  )
  .version(VERSION);

// Main dump command (default action)
program
  .option("-i, --bin <path>", "IL2CPP binary file")
  .option("-m, --metadata <path>", "Metadata / model export file")
  .option("-c, --cs-out <path>", "C# output file or directory")
  .option("-p, --py-out <path>", "IDA Python script output file")
  .option(
    "-e, --exclude-namespaces <list>",
    "Comma-separated namespaces to exclude, or 'none'",
  )
  .option("-l, --layout <schema>", "single, namespace, assembly, class or tree")
  .option("-s, --sort <order>", "index or name")
  .option("-f, --flatten", "Don't nest namespace folders")
  .option("-n, --suppress-metadata", "Omit pointers, offsets and indices")
  .option("-k, --must-compile", "Tidy the output so it compiles")
  .option("--separate-attributes", "Write assembly attributes to AssemblyInfo files")
  .option("-j, --project", "Create a Visual Studio solution")
  .option("--unity-path <path>", "Unity editor folder (wildcards allowed)")
  .option(
    "--unity-assemblies <path>",
    "Unity script assemblies folder (wildcards allowed)",
  )
  .option("--templates <dir>", "Directory with custom .hbs templates")
  .option("--config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(dumpCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
