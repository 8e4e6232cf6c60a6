/*
 * Writes docs/ENVIRONMENTS.md: a markdown table of the registered environments.
 * Usage: npm run docs:envs
 */
import * as path from 'path';
import fs from 'fs-extra';
import { listEnvironments } from '../src/env/registry';
import { renderEnvironmentTable } from '../src/env/registry.table';

const DOCS_DIR = path.resolve('docs');
const OUTPUT = path.join(DOCS_DIR, 'ENVIRONMENTS.md');

async function writeIfChanged(file: string, content: string) {
  if (await fs.pathExists(file)) {
    const prev = await fs.readFile(file, 'utf8');
    if (prev === content) return false;
  }
  await fs.writeFile(file, content, 'utf8');
  return true;
}

async function main() {
  await fs.ensureDir(DOCS_DIR);
  const specs = listEnvironments();
  const content = '# Registered environments\n\n' + renderEnvironmentTable(specs);
  const written = await writeIfChanged(OUTPUT, content);
  console.log(`[docs] ${written ? 'Wrote' : 'Unchanged'} ${OUTPUT} (${specs.length} environments)`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
