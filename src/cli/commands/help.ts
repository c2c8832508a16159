import * as ui from '../ui.js';

export function showHelp(toolName: string): void {
  ui.note(
    `Usage:
  wit-sim <command> [options...]

Commands:
  run "<command>" [args...]    Replay one command against a fresh context
    -i, --input <value>        Stage an answer for an interactive prompt (repeatable, FIFO)
    -r, --role <role>          User role recorded in history entries
    -s, --seed <path>          JSON file with workItems and flags to start from
    --summary                  Print the exit code and staged answer count
  help                         Show this help message

Simulated subcommands:
  ${toolName} list [p|pretty]
  ${toolName} update <id>
  ${toolName} print <id>
  ${toolName} makechildren <ids> [--title="..."]

Examples:
  wit-sim run "${toolName} list" pretty --seed items.json
  wit-sim run "${toolName} update" WI-1 --input 1 --input "New title" --seed items.json
  wit-sim run "${toolName} print WI-1" --seed items.json

Environment:
  HARNESS_LOG_LEVEL           debug | info | warn | error (default: warn)
  HARNESS_TOOL_NAME           Simulated command family (default: wit)
  HARNESS_MAX_CAPTURE_BYTES   Per-channel capture limit (default: 1048576)
  HARNESS_USER_ROLE           Default user role (default: system)`,
    ui.bold('wit-sim: scripted CLI interaction harness')
  );
}
