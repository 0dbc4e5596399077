import { existsSync, readdirSync } from 'node:fs';
import { join, relative, sep } from 'node:path';

const ROOTS = ['apps', 'packages'];
const SKIP_DIRS = new Set(['node_modules', 'dist', 'coverage', 'output']);

const anyTest = /\.(test|spec)\.[cm]?tsx?$/;
const unitTest = /\.unit\.test\.ts$/;

function walk(dir: string, out: string[]) {
  if (!existsSync(dir)) return;
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (SKIP_DIRS.has(entry.name)) continue;
    const full = join(dir, entry.name);
    if (entry.isDirectory()) walk(full, out);
    else if (anyTest.test(entry.name)) out.push(full);
  }
}

const tests: string[] = [];
for (const root of ROOTS) walk(root, tests);

const problems: string[] = [];
for (const file of tests) {
  const rel = relative(process.cwd(), file);
  if (!unitTest.test(file)) {
    problems.push(`${rel}: name tests <module>.unit.test.ts`);
    continue;
  }
  if (!rel.split(sep).includes('src')) {
    problems.push(`${rel}: tests live beside their module under src/`);
  }
  // every test sits next to the module it covers
  const subject = file.replace(unitTest, '.ts');
  if (!existsSync(subject)) problems.push(`${rel}: no sibling ${relative(process.cwd(), subject)}`);
}

if (problems.length > 0) {
  console.error(`Test file layout: ${problems.length} problem(s) in ${tests.length} file(s)`);
  for (const p of problems.sort()) console.error(`- ${p}`);
  process.exit(1);
}

console.log(`Test file layout: ${tests.length} file(s) OK`);
