/**
 * @fileoverview Help text for ui-audit CLI commands
 */

const HELP_TEXT = {
  main: `
ui-audit - Rule-based UI source audit

USAGE:
    ui-audit <command> [options]

COMMANDS:
    audit <path>        Audit a source tree (or a single file)
    rules               List and validate the rule corpus
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information

EXIT CODES:
    0   No finding at or above the --fail-on threshold
    1   Findings at or above the threshold
    2   Invalid arguments, configuration or corpus, or an unreadable path

For more information on a specific command, run:
    ui-audit help <command>
`,

  audit: `
ui-audit audit - Audit UI source code against the rule corpus

USAGE:
    ui-audit audit <path> [options]

OPTIONS:
    --profile=<category>      Project category: productivity, media, utility,
                              social, game, education, health, finance, general
    --platforms=<p1,p2>       Target platforms: ios, ipados, macos, watchos,
                              tvos, visionos, android, web (default: all)
    --format=text|json        Report format (default: text)
    --fail-on=<severity>      critical, important or minor (default: critical)
    --corpus=<file>           Rule corpus (default: the bundled corpus)
    --config=<file>           Configuration file (default: ui-audit.config.yaml
                              or .json in the audited directory)
    --include-suppressed      List suppressed findings with their justification
    --concurrency=<n|auto>    Files audited in parallel (default: CPU count)
    --cache                   Reuse results for unchanged files (.ui-audit/cache.json)
    --progress                Show a progress bar on stderr
    --verbose                 Debug logging on stderr

SUPPRESSIONS:
    // ui-audit-allow [rule-id,...] [as=<severity>] [-- justification]

    A trailing comment covers its own line; a comment on its own line covers
    the next line. With as=<severity> the finding stays visible at the new
    severity and the change is listed under overrides.

ENVIRONMENT:
    UI_AUDIT_CONCURRENCY      Default worker count (number or "auto")
    UI_AUDIT_LOG_LEVEL        debug, info, warn, error or silent

EXAMPLES:
    ui-audit audit ./ios/App --profile=productivity --platforms=ios,ipados
    ui-audit audit . --format=json --fail-on=important > report.json
`,

  rules: `
ui-audit rules - List the rules of a corpus

USAGE:
    ui-audit rules [--corpus=<file>] [--format=text|json]

Loading the corpus validates it; an invalid corpus exits with code 2.
`,
} as const;

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.hasOwn(HELP_TEXT, value);
}

export function getHelpText(command?: string): string {
  if (command && isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  if (command) {
    return `Unknown command: ${command}\n${HELP_TEXT.main}`;
  }
  return HELP_TEXT.main;
}
