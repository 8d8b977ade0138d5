// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { createRequire } from "node:module";

import { Command, InvalidArgumentError, Option } from "commander";

import {
  handleArchiveExport,
  handleArchiveImport,
  handleChatCreate,
  handleChatDelete,
  handleChatGet,
  handleChatList,
  handleChatUpdate,
  handleInitDb,
  handleMessageAdd,
  handleMessageDelete,
  handleMessageGet,
  handleMessageList,
  handleMessageUpdate,
  handleSearch,
  handleStats,
} from "./handlers/index.js";

const require = createRequire(import.meta.url);
const { version } = require("../package.json") as { version: string };

/** Parse a string as a positive integer, throwing on invalid input. */
function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return n;
}

function databaseOption(): Option {
  return new Option(
    "--database <url>",
    "Database URL or SQLite path (default: $DATABASE_URL)",
  );
}

function orderOption(): Option {
  return new Option("--order <order>", "Sort direction").choices([
    "asc",
    "desc",
  ]);
}

function addChatFields(command: Command): Command {
  return command
    .option("--chat-id <id>", "Identifier on the source platform")
    .option("--link <url>", "Link to the chat")
    .option("--type <type>", "Chat type, e.g. group or channel")
    .option("--image <path>", "Stored image reference")
    .option("--joined <date>", "Join date (YYYY-MM-DD)")
    .option("--active", "Mark as active")
    .option("--no-active", "Mark as inactive")
    .option("--member", "Mark as a member")
    .option("--no-member", "Mark as not a member")
    .option("--public", "Mark as public")
    .option("--no-public", "Mark as private")
    .option("--notes <text>", "Free-form notes");
}

function addMessageFields(command: Command): Command {
  return command
    .option("--msg-id <id>", "Message identifier on the source platform")
    .option("--link <url>", "Link to the message")
    .option("--media <list>", "Comma-separated media references")
    .option("--screenshot <path>", "Stored screenshot reference")
    .option("--tags <list>", "Comma-separated tags")
    .option("--notes <text>", "Free-form notes");
}

/**
 * Create the CLI program with all subcommands registered.
 */
export function createProgram(): Command {
  const program = new Command()
    .name("chatvault")
    .description("Archive and browse exported chat conversations")
    .version(version);

  program
    .command("init-db")
    .description("Create the archive tables if they do not exist")
    .addOption(databaseOption())
    .action(handleInitDb);

  program
    .command("chat-list")
    .description("List chats with message counts")
    .option("--sort <field>", "Sort by name, message_count or last_message")
    .addOption(orderOption())
    .addOption(databaseOption())
    .option("--json", "Output as JSON")
    .action(handleChatList);

  program
    .command("chat-get")
    .description("Show a chat")
    .argument("<slug>", "Chat slug")
    .addOption(databaseOption())
    .option("--json", "Output as JSON")
    .action(handleChatGet);

  addChatFields(
    program
      .command("chat-create")
      .description("Create a chat; the slug is derived from the name")
      .requiredOption("--name <name>", "Chat name"),
  )
    .addOption(databaseOption())
    .option("--json", "Output as JSON")
    .action(handleChatCreate);

  addChatFields(
    program
      .command("chat-update")
      .description("Update a chat; pass an empty value to clear a field")
      .argument("<slug>", "Chat slug")
      .option("--name <name>", "New name (derives a new slug)"),
  )
    .addOption(databaseOption())
    .option("--json", "Output as JSON")
    .action(handleChatUpdate);

  program
    .command("chat-delete")
    .description("Delete a chat and all of its messages")
    .argument("<slug>", "Chat slug")
    .addOption(databaseOption())
    .option("--json", "Output as JSON")
    .action(handleChatDelete);

  program
    .command("message-list")
    .description("List the messages of a chat")
    .argument("<slug>", "Chat slug")
    .option("--sort <field>", "Sort by timestamp or msg_id")
    .addOption(orderOption())
    .addOption(databaseOption())
    .option("--json", "Output as JSON")
    .action(handleMessageList);

  program
    .command("message-get")
    .description("Show a message with its neighbours in the chat")
    .argument("<id>", "Message row id", parsePositiveInt)
    .addOption(databaseOption())
    .option("--json", "Output as JSON")
    .action(handleMessageGet);

  addMessageFields(
    program
      .command("message-add")
      .description("Add a message to a chat")
      .argument("<slug>", "Chat slug")
      .requiredOption(
        "--timestamp <datetime>",
        "Date and time; naive values use $CHATVAULT_TIMEZONE",
      )
      .requiredOption("--text <text>", "Message text"),
  )
    .addOption(databaseOption())
    .option("--json", "Output as JSON")
    .action(handleMessageAdd);

  addMessageFields(
    program
      .command("message-update")
      .description("Update a message; pass an empty value to clear a field")
      .argument("<id>", "Message row id", parsePositiveInt)
      .option("--timestamp <datetime>", "Date and time")
      .option("--text <text>", "Message text"),
  )
    .addOption(databaseOption())
    .option("--json", "Output as JSON")
    .action(handleMessageUpdate);

  program
    .command("message-delete")
    .description("Delete a message")
    .argument("<id>", "Message row id", parsePositiveInt)
    .addOption(databaseOption())
    .option("--json", "Output as JSON")
    .action(handleMessageDelete);

  program
    .command("search")
    .description("Search messages by text, tag or date")
    .addOption(
      new Option("--action <action>", "Filter kind (inferred when omitted)")
        .choices(["search", "tag", "filter"]),
    )
    .option("--query <text>", "Text to search for")
    .option("--case-sensitive", "Match letter case exactly")
    .option("--tag <tag>", "Exact tag")
    .addOption(
      new Option("--date-mode <mode>", "Date comparison").choices([
        "on",
        "before",
        "after",
        "between",
      ]),
    )
    .option("--start <date>", "Date, or start of the range (YYYY-MM-DD)")
    .option("--end <date>", "End of the range (YYYY-MM-DD)")
    .option("--chat <slug>", "Limit to one chat")
    .option("--sort <field>", "Sort by timestamp or msg_id")
    .addOption(orderOption())
    .addOption(databaseOption())
    .option("--json", "Output as JSON")
    .action(handleSearch);

  program
    .command("stats")
    .description("Show archive totals")
    .addOption(databaseOption())
    .option("--json", "Output as JSON")
    .action(handleStats);

  program
    .command("archive-export")
    .description("Export a chat with its messages as YAML or JSON")
    .argument("<slug>", "Chat slug")
    .addOption(
      new Option("--format <format>", "Export format")
        .choices(["yaml", "json"])
        .default("yaml"),
    )
    .option("--output <path>", "Output file path (default: stdout)")
    .addOption(databaseOption())
    .action(handleArchiveExport);

  program
    .command("archive-import")
    .description("Import a chat archive document")
    .requiredOption("--file <path>", "Path to a YAML or JSON archive")
    .addOption(
      new Option(
        "--format <format>",
        "Document format (default: from the file extension)",
      ).choices(["yaml", "json"]),
    )
    .option("--merge", "Add to an existing chat with the same slug")
    .addOption(databaseOption())
    .option("--json", "Output as JSON")
    .action(handleArchiveImport);

  return program;
}
