import { z } from "zod";
import { ArgumentParser, arg, initializeEventEmitter } from "../index.js";

enum LogLevel {
  Debug = "debug",
  Info = "info",
  Warning = "warning",
}

const AddCommand = z.object({
  name: z.string().describe("name of the item to add"),
  tags: z.array(z.string()).default([]).describe("labels attached to the item"),
});

const RemoveCommand = z.object({
  id: z.number().int().describe("id of the item to remove"),
  force: z.boolean().default(false).describe("skip the confirmation prompt"),
});

const Arguments = z.object({
  store: z.string().describe("path to the item store"),
  color: z.enum(["red", "green", "blue"]).default("green").describe("output color"),
  level: z.nativeEnum(LogLevel).default(LogLevel.Info).describe("log level"),
  headers: z.record(z.string()).optional().describe("extra request headers"),
  verbose: z.boolean().default(false).describe("pretty-print the parsed arguments"),
  add: AddCommand.optional().describe("add an item"),
  remove: arg(RemoveCommand.optional().describe("remove an item"), { alias: "rm" }),
});

function main(): void {
  initializeEventEmitter({
    format: "pretty",
    verbose: true,
    terminal: process.env.ITEMS_TRACE === "1",
  });

  const parser = new ArgumentParser({
    model: Arguments,
    prog: "items",
    description: "Manage a small item store.",
    version: "0.1.0",
    epilog: "Values not given on the command line are read from ITEMS_* variables.",
    env: { prefix: "ITEMS_" },
  });
  const args = parser.parseTypedArgs();

  console.log(JSON.stringify(args, null, args.verbose ? 2 : undefined));
}

main();
