#!/usr/bin/env node
/**
 * Quill CLI - Call a single builtin
 *
 * Usage:
 *   quill-call Add 2 3.5
 *   quill-call --config ./quill.yaml ReadFile notes.txt
 *   quill-call --list
 */

import * as fs from 'fs';
import { listBuiltinNames, parseCliArgs, runCall } from './cli-shared.js';

/**
 * Display help information
 */
function showHelp(): void {
  console.log(`Quill Builtin Runner

Usage:
  quill-call <builtin> [args...]    Call a builtin with parsed arguments
  quill-call --config <path> ...    Use a configuration file
  quill-call --list                 List registered builtins
  quill-call --help                 Show this help message
  quill-call --version              Show version information

Arguments are parsed as integers, floats, true/false, null, JSON lists and
objects, and otherwise passed as strings.

Examples:
  quill-call Add 2 3.5
  quill-call split "a,b,c" ,
  quill-call map_get '{"k": 1}' k`);
}

/**
 * Display version information
 */
function showVersion(): void {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    fs.readFileSync(packageJsonPath, 'utf-8')
  );
  const version =
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
      ? packageJson.version
      : 'unknown';
  console.log(`quill-call ${version}`);
}

/**
 * Entry point for quill-call binary
 */
async function main(): Promise<void> {
  try {
    const command = parseCliArgs(process.argv.slice(2));

    if (command.mode === 'help') {
      showHelp();
      return;
    }

    if (command.mode === 'version') {
      showVersion();
      return;
    }

    if (command.mode === 'list') {
      for (const name of listBuiltinNames()) {
        console.log(name);
      }
      return;
    }

    const code = await runCall(command, {
      stdout: (line) => console.log(line),
      stderr: (line) => console.error(line),
      cwd: process.cwd(),
    });
    process.exit(code);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

void main();
