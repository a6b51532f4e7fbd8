#!/usr/bin/env tsx

import { loadConfig, validateConfig } from "../src/config";

const args = process.argv.slice(2);
const command = args[0];

if (command === "doctor") {
  process.stdout.write("\n  Checking config...\n");
  const config = loadConfig();
  const { valid, issues } = validateConfig(config);

  if (valid) {
    process.stdout.write(`  ✓ Gerrit ${config.gerrit.username}@${config.gerrit.host}:${config.gerrit.port}\n`);
    process.stdout.write(`  ✓ SSH key ${config.gerrit.privateKeyPath}\n`);
    process.stdout.write(`  ✓ ${Object.keys(config.users).length} user(s) configured\n`);
    process.stdout.write("\n  All checks passed.\n\n");
  } else {
    for (const issue of issues) {
      process.stdout.write(`  ✗ ${issue}\n`);
    }
    process.stdout.write(`\n  ${issues.length} issue(s) found.\n\n`);
  }
  process.exit(valid ? 0 : 1);
}

if (command === "start" || !command) {
  const { valid, issues } = validateConfig(loadConfig());
  if (!valid) {
    for (const issue of issues) {
      process.stdout.write(`  ⚠ ${issue}\n`);
    }
    process.stdout.write("\n");
  }

  process.stdout.write("  Starting gerrit-relay...\n\n");
  await import("../src/index");
} else if (command === "help" || command === "--help" || command === "-h") {
  console.log(`
gerrit-relay - Gerrit review notifications in chat

Usage:
  gerrit-relay           Start the relay (Slack if tokens are set, else CLI)
  gerrit-relay start     Same as above
  gerrit-relay doctor    Check configuration and SSH key files
  gerrit-relay help      Show this message

Environment:
  GERRIT_HOST          Gerrit SSH host
  GERRIT_PORT          Gerrit SSH port (default: 29418)
  GERRIT_USERNAME      Gerrit user the relay logs in as
  GERRIT_PRIVATE_KEY   Path to the SSH private key (public key at <path>.pub)
  SLACK_BOT_TOKEN      Slack bot token (xoxb-...)
  SLACK_APP_TOKEN      Slack app token (xapp-...)
  CLI_MODE=true        Force the console adapter
  CONFIG_PATH          Config file (default: ./config.json)
  DB_PATH              SQLite database (default: ./gerrit-relay.db)
  LOG_LEVEL            debug, info, warn or error (default: info)
`);
  process.exit(0);
} else {
  console.log(`Unknown command: ${command}. Run 'gerrit-relay help' for usage.`);
  process.exit(1);
}
