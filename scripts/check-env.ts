#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for longloop.
 * Checks the build configuration, ffmpeg/ffprobe, source directories and disk space.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { buildConfigFromEnv, type BuildConfig } from '../src/config.js';
import { ValidationError } from '../src/utils/errors.js';
import { runPreflight } from '../src/preflight.js';

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const note = (label: string, detail: string) =>
  console.log(`  ${YELLOW}○${RESET} ${label}  ${detail}`);

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`\n${BOLD}=== longloop — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Build configuration${RESET}`);

let config: BuildConfig;
try {
  config = buildConfigFromEnv();
  pass('LONGLOOP_* variables', `${config.duration}s at ${config.resolution.width}x${config.resolution.height}, ${config.fps} fps`);
} catch (err) {
  if (!(err instanceof ValidationError)) throw err;
  for (const issue of err.issues) fail(issue, 'Set the variable in .env (e.g. LONGLOOP_DURATION=600)');
  process.exit(1);
}

const report = runPreflight(config);

// ── Section: Engine ───────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Transcoding engine${RESET}`);
for (const [bin, found] of Object.entries(report.tools)) {
  if (found) pass(bin);
  else fail(bin, `Install ${bin} and make sure it is on PATH`);
}

// ── Section: Sources ──────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Source directories${RESET}`);
for (const s of report.sources) {
  if (s.count > 0) pass(`${s.category}/`, `${s.count} file(s) in ${s.dir}`);
  else if (s.required) fail(`${s.category}/`, s.exists ? `Add source clips to ${s.dir}` : `Create: mkdir -p "${s.dir}"`);
  else note(`${s.category}/`, '(empty or missing — optional)');
}

// ── Section: Disk ─────────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Disk space${RESET}`);
if (report.diskProblem === null) pass('output directory has room for the estimated file');
else fail(report.diskProblem, 'Free up space or point LONGLOOP_OUTPUT elsewhere');

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (report.ok) {
  console.log(`${GREEN}${BOLD}All required checks passed.${RESET}\n`);
  process.exit(0);
} else {
  console.error(`${RED}${BOLD}One or more required checks failed.${RESET}\n`);
  process.exit(1);
}
