#!/usr/bin/env node
/**
 * CLI entry point for apiwarden.
 * Handles argument parsing, the --init command and environment variable
 * setup, then hands over to the server bootstrap.
 */

import { parseArgs } from 'node:util';
import { existsSync, mkdirSync, copyFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join, resolve } from 'node:path';

// Parse CLI arguments
const { values } = parseArgs({
  options: {
    config: {
      type: 'string',
      short: 'c',
    },
    port: {
      type: 'string',
      short: 'p',
    },
    init: {
      type: 'boolean',
    },
    help: {
      type: 'boolean',
      short: 'h',
    },
  },
  strict: false, // Allow unknown args to pass through
});

// Handle --help
if (values.help) {
  console.log(`
apiwarden - quota-aware caching proxy for rate-limited APIs

Usage:
  apiwarden [options]

Options:
  -c, --config <path>   Path to config file (default: ./config/config.yaml)
  -p, --port <port>     Port to listen on (overrides config)
  --init                Initialize config file in current directory
  -h, --help            Show this help message

Examples:
  apiwarden                                 # Run with default config
  apiwarden --config /etc/apiwarden.yaml    # Run with custom config path
  apiwarden --init                          # Create config/config.yaml from example
`);
  process.exit(0);
}

// Handle --init
if (values.init) {
  const targetPath = resolve(process.cwd(), 'config', 'config.yaml');
  const sourcePath = join(dirname(fileURLToPath(import.meta.url)), '..', 'config', 'config.example.yaml');

  // Check if target already exists
  if (existsSync(targetPath)) {
    console.error(`Error: Config file already exists at ${targetPath}`);
    process.exit(1);
  }

  // Check if source example exists
  if (!existsSync(sourcePath)) {
    console.error('Error: Example config not found (package may be corrupted)');
    process.exit(1);
  }

  // Create target directory
  mkdirSync(dirname(targetPath), { recursive: true });

  // Copy example to target
  copyFileSync(sourcePath, targetPath);

  console.log(`Created config file: ${targetPath}`);
  console.log('');
  console.log('Next steps:');
  console.log('  1. Set upstream.baseUrl and the quota of the API you call');
  console.log('  2. Run: apiwarden');
  console.log('');

  process.exit(0);
}

// Set environment variables for the application
if (typeof values.config === 'string') {
  process.env['CONFIG_PATH'] = values.config;
}
if (typeof values.port === 'string') {
  process.env['PORT'] = values.port;
}

// Bootstrap the application
await import('./index.js');
