/**
 * `NAME=value` environment files.
 *
 * Values are shell-quoted on write and shell-split on read, so anything a
 * POSIX shell could `source` round-trips, including quotes, `$`, `#` and
 * glob characters. Variable references are never expanded.
 */

import * as fs from 'fs';
import { parse as shellSplit, quote as shellQuote } from 'shell-quote';
import { MalformedRecordError } from '../errors.js';
import { writeFileAtomic } from '../utils/atomic-write.js';

export type EnvMapping = Record<string, string>;

const EMPTY_QUOTED = new Set(["''", '""']);

/**
 * Backslash-escape `$` outside single quotes and `#` outside any quotes, so
 * variable references and hashes stay literal text.
 */
function escapeExpansions(raw: string): string {
  let out = '';
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < raw.length; i++) {
    const c = raw[i];
    if (quote === "'") {
      if (c === "'") quote = null;
      out += c;
    } else if (c === '\\') {
      out += c + (raw[i + 1] ?? '');
      i++;
    } else if (c === '"') {
      quote = quote === '"' ? null : '"';
      out += c;
    } else if (c === "'" && quote === null) {
      quote = "'";
      out += c;
    } else if (c === '$' || (c === '#' && quote === null)) {
      out += `\\${c}`;
    } else {
      out += c;
    }
  }
  return out;
}

function parseValue(raw: string, filePath: string, lineNumber: number): string {
  const trimmed = raw.trim();
  if (EMPTY_QUOTED.has(trimmed)) return '';

  const tokens = shellSplit(escapeExpansions(trimmed));
  const [token] = tokens;
  // `*` and `?` come back as glob operators, escaped or not
  let value: string | undefined;
  if (typeof token === 'string') value = token;
  else if (token !== undefined && 'pattern' in token) value = token.pattern;

  if (tokens.length !== 1 || value === undefined) {
    throw new MalformedRecordError(`Malformed env file: ${filePath} (line ${lineNumber})`, filePath);
  }
  return value;
}

/**
 * Parse env-file text. Blank lines are skipped; every other line must be
 * `NAME=value` with a value that unquotes to exactly one token.
 */
export function parseEnvFile(text: string, filePath = '<input>'): EnvMapping {
  const env: EnvMapping = {};

  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === '') return;

    const eq = line.indexOf('=');
    if (eq <= 0) {
      throw new MalformedRecordError(`Malformed env file: ${filePath} (line ${index + 1})`, filePath);
    }

    const name = line.slice(0, eq).trim();
    env[name] = parseValue(line.slice(eq + 1), filePath, index + 1);
  });

  return env;
}

export function loadEnvFile(filePath: string): EnvMapping {
  return parseEnvFile(fs.readFileSync(filePath, 'utf8'), filePath);
}

/**
 * One `NAME=<quoted value>` line per entry. Values spanning lines cannot be
 * read back and are refused.
 */
export function formatEnvFile(env: EnvMapping, filePath = '<output>'): string {
  return Object.entries(env)
    .map(([name, value]) => {
      if (/[\r\n]/.test(value)) {
        throw new MalformedRecordError(`Value of ${name} contains a line break: ${filePath}`, filePath);
      }
      return `${name}=${shellQuote([value])}\n`;
    })
    .join('');
}

export function writeEnvFile(filePath: string, env: EnvMapping): void {
  writeFileAtomic(filePath, formatEnvFile(env, filePath));
}
