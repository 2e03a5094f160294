#!/usr/bin/env npx tsx
/**
 * CLI tool to decode an IPv4 header and print every field.
 *
 * Usage:
 *   npx tsx cli/decode-packet.ts [hex-string | path-to-hex-fixture]
 *
 * Defaults to tests/fixtures/ipv4_header.hex if no argument given.
 */

import * as fs from 'fs';
import * as path from 'path';
import { hexToBytes } from '../src';
import { ipv4Header } from './layouts/ipv4Header';

const DEFAULT_FIXTURE = path.join(__dirname, '..', 'tests', 'fixtures', 'ipv4_header.hex');

/** Read hex from a fixture file when the argument names one, else take it as hex. */
function loadInput(arg: string | undefined): { source: string; hex: string } {
  const target = arg ?? DEFAULT_FIXTURE;
  if (fs.existsSync(target)) {
    return { source: target, hex: fs.readFileSync(target, 'utf-8') };
  }
  return { source: 'argument', hex: target };
}

function main(): void {
  const { source, hex } = loadInput(process.argv[2]);
  const bytes = hexToBytes(hex);

  console.log(`=== IPv4 Header Decoder ===`);
  console.log(`Input: ${source} (${bytes.length} bytes)\n`);

  const header = ipv4Header();
  header.decode(bytes);

  for (const key of header.keys()) {
    console.log(`${key} = ${header.field(key).strValue()}`);
  }
  console.log(`\nheader size: ${header.size()} bytes`);
}

try {
  main();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}
