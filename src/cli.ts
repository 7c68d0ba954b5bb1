#!/usr/bin/env node
import { ModelDescriptionParser } from './ModelDescriptionParser';

/**
 * Parse a model description, print its tree and check that releasing it
 * leaves no live nodes behind.
 */
export function main(argv: string[]): number {
  if (argv.length !== 1) {
    console.error('usage: fmimd <modelDescription.xml>');
    return 2;
  }
  const xmlPath = argv[0];
  const parser = new ModelDescriptionParser();
  const md = parser.parseFile(xmlPath);
  if (!md) return 1;

  console.log(`Successfully parsed ${xmlPath}`);
  console.log(md.format());
  md.free();
  if (parser.arena.liveCount > 0) {
    console.error(`${parser.arena.liveCount} node(s) still allocated`);
    return 1;
  }
  return 0;
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
