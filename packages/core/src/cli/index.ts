#!/usr/bin/env node
/**
 * listsync CLI
 *
 * Usage:
 *   listsync lists                        Show all lists
 *   listsync list create "Groceries"      Create a list
 *   listsync item add Groceries Milk      Add an item
 *   listsync item toggle Groceries Milk   Check it off
 *   listsync sync                         Sync until Ctrl+C
 *
 * Run `listsync help` for the full list.
 */

// Load .env before reading SUPABASE_URL, SUPABASE_ANON_KEY or POSTHOG_API_KEY
import { config as loadDotenv } from "dotenv";
loadDotenv();

import { getTelemetryClient, shutdownTelemetry } from "@listsync/telemetry";
import {
  cmdConfigSet,
  cmdConfigShow,
  cmdHelp,
  cmdItemAdd,
  cmdItemClear,
  cmdItemRemove,
  cmdItemToggle,
  cmdListCreate,
  cmdListDelete,
  cmdListLeave,
  cmdListRename,
  cmdListShare,
  cmdListShow,
  cmdListUnshare,
  cmdLists,
  cmdStatus,
  cmdSync,
} from "./commands.js";
import { errorMessage } from "../sync/result.js";

const args = process.argv.slice(2);
const command = args[0];
const subcommand = args[1];

const telemetry = getTelemetryClient();
telemetry.setSurface("cli");

function option(name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx !== -1 ? args[idx + 1] : undefined;
}

/**
 * Run a command, record its outcome and exit non-zero on failure
 */
function run(name: string, fn: () => Promise<void> | void): void {
  Promise.resolve()
    .then(fn)
    .then(
      async () => {
        telemetry.trackCommand(name, true);
        await shutdownTelemetry();
      },
      async (e: unknown) => {
        console.error("Error:", errorMessage(e));
        telemetry.trackCommand(name, false);
        await shutdownTelemetry();
        process.exit(1);
      }
    )
    .catch((e: unknown) => {
      console.error("Error:", errorMessage(e));
      process.exit(1);
    });
}

async function cmdTelemetry(action: string | undefined): Promise<void> {
  switch (action) {
    case "on":
      telemetry.enable();
      console.log("Telemetry enabled");
      break;
    case "off":
      await telemetry.disable();
      console.log("Telemetry disabled");
      break;
    default:
      console.log(`Telemetry: ${telemetry.isEnabled() ? "enabled" : "disabled"}`);
      console.log(`Anonymous id: ${telemetry.getUserId()}`);
  }
}

switch (command) {
  case "lists":
  case "ls":
    run("lists", cmdLists);
    break;

  case "list":
    switch (subcommand) {
      case "show":
        run("list.show", () => cmdListShow(args[2]));
        break;
      case "create":
        run("list.create", () =>
          cmdListCreate(args[2], {
            description: option("--description"),
            color: option("--color"),
          })
        );
        break;
      case "rename":
        run("list.rename", () => cmdListRename(args[2], args[3]));
        break;
      case "delete":
      case "rm":
        run("list.delete", () => cmdListDelete(args[2]));
        break;
      case "share":
        run("list.share", () => cmdListShare(args[2], args[3]));
        break;
      case "unshare":
        run("list.unshare", () => cmdListUnshare(args[2], args[3]));
        break;
      case "leave":
        run("list.leave", () => cmdListLeave(args[2]));
        break;
      default:
        cmdHelp();
    }
    break;

  case "item":
    switch (subcommand) {
      case "add":
        run("item.add", () => cmdItemAdd(args[2], args[3], option("--quantity")));
        break;
      case "toggle":
        run("item.toggle", () => cmdItemToggle(args[2], args[3]));
        break;
      case "remove":
      case "rm":
        run("item.remove", () => cmdItemRemove(args[2], args[3]));
        break;
      case "clear":
        run("item.clear", () => cmdItemClear(args[2]));
        break;
      default:
        cmdHelp();
    }
    break;

  case "sync":
    run("sync", () => cmdSync(telemetry));
    break;

  case "status":
    run("status", cmdStatus);
    break;

  case "config":
    if (subcommand === "set") {
      run("config.set", () => cmdConfigSet(args[2], args[3]));
    } else {
      run("config.show", cmdConfigShow);
    }
    break;

  case "telemetry":
    run("telemetry", () => cmdTelemetry(subcommand));
    break;

  default:
    cmdHelp();
}
