#!/usr/bin/env node
import { decodeHexStream, encodeCommand } from './commands.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function cmdDecode(hex?: string) {
  const input = hex ?? (await readStdin());
  const { lines, error } = decodeHexStream(input);
  for (const line of lines) console.log(line);
  if (error !== undefined) {
    console.log(`Error: ${error}`);
    process.exitCode = 1;
  }
}

function cmdEncode(args: string[]) {
  console.log(encodeCommand(args));
}

function fail(e: unknown) {
  console.error(`Error: ${e instanceof Error ? e.message : e}`);
  process.exitCode = 1;
}

// Main
const [, , cmd, ...args] = process.argv;

switch (cmd) {
  case 'decode':
    cmdDecode(args[0]).catch(fail);
    break;
  case 'encode':
    try {
      cmdEncode(args);
    } catch (e) {
      fail(e);
    }
    break;
  default:
    console.log('Usage:');
    console.log('  capsule-codec decode [hex]                    Decode a capsule stream (hex, or stdin)');
    console.log('  capsule-codec encode datagram <hex>           Encode a DATAGRAM capsule');
    console.log('  capsule-codec encode close <code> [message]   Encode a CLOSE_WEBTRANSPORT_SESSION capsule');
    console.log('  capsule-codec encode unknown <type> [hex]     Encode a capsule of any type');
}
