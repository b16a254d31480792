#!/usr/bin/env node

import { stat, writeFile } from 'fs/promises';
import { glob, isDynamicPattern } from 'fast-glob';
import { createLayoutConfig, loadLayoutConfig, type LayoutConfig } from '../lib/config';
import { loadSpellFile, loadSpellFolder, type Spell } from '../lib/content';
import { createSpellbook } from '../lib/core';
import { LayoutError } from '../lib/errors';
import { parseArgs } from './args';

const HELP = `
spellbook-press - lay out spell cards as a printable PDF spellbook

Usage:
  spellbook-press [options] <spell.json | dir | glob>...

Options:
  --config <file>       Layout configuration (JSON, merged over the defaults)
  --title <text>        Title page text (default "Spellbook")
  --background <file>   PNG or JPEG drawn under every page
  --out <file>          Output path (default spellbook.pdf)
  --help                Show this message

Examples:
  spellbook-press ./spells
  spellbook-press --title "Wizard's Tome" --out tome.pdf "./spells/**/*.json"
`;

/**
 * Expand inputs to spells: directories contribute their *.json files,
 * patterns are matched with fast-glob, anything else is read as a file.
 */
async function loadInputs(inputs: readonly string[]): Promise<Spell[]> {
  const spells: Spell[] = [];

  for (const input of inputs) {
    if (isDynamicPattern(input)) {
      const matches = await glob(input, { absolute: true, onlyFiles: true });
      for (const file of matches.filter((match) => match.endsWith('.json')).sort()) {
        spells.push(...(await loadSpellFile(file)));
      }
    } else if (await isDirectory(input)) {
      spells.push(...(await loadSpellFolder(input)));
    } else {
      spells.push(...(await loadSpellFile(input)));
    }
  }

  return spells;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    // Missing paths are reported by loadSpellFile.
    return false;
  }
}

async function main() {
  const options = parseArgs(process.argv.slice(2));

  if (options.help || options.inputs.length === 0) {
    console.log(HELP);
    process.exit(options.help ? 0 : 1);
  }

  const config: LayoutConfig = options.config
    ? await loadLayoutConfig(options.config)
    : createLayoutConfig();
  const spells = await loadInputs(options.inputs);
  if (spells.length === 0) {
    console.error('No spells found in the given inputs');
    process.exit(1);
  }

  console.log(`Laying out ${spells.length} spells...`);
  let pageCount = 0;
  const bytes = await createSpellbook({
    title: options.title,
    spells,
    config,
    background: options.background,
    onPageAdded: () => {
      pageCount++;
    }
  });

  await writeFile(options.out, bytes);
  console.log(`Wrote ${pageCount} pages to ${options.out}`);
}

main().catch((error: unknown) => {
  if (error instanceof LayoutError) {
    console.error(`Error [${error.code}]: ${error.message}`);
  } else {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exit(1);
});
