import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { LOG_LEVELS, isLogLevel, levelOrder } from '../pipeline/log';

function tailFile(file: string, printLine: (line: string) => void) {
  let size = fs.statSync(file).size;
  let pending = '';
  setInterval(() => {
    const stat = fs.statSync(file);
    if (stat.size <= size) return;
    const stream = fs.createReadStream(file, { start: size, end: stat.size - 1, encoding: 'utf8' });
    stream.on('data', (chunk) => {
      const lines = (pending + chunk).split(/\r?\n/);
      pending = lines.pop() ?? '';
      lines.forEach(printLine);
    });
    stream.on('error', (e) => console.error('Failed to read', file, e));
    size = stat.size;
  }, 1500);
}

/** Latest workflow_<timestamp>.log in dir; the timestamp sorts lexicographically */
function latestRunLog(dir: string): string | null {
  if (!fs.existsSync(dir)) return null;
  const candidates = fs
    .readdirSync(dir)
    .filter((f) => /^workflow_\d{8}_\d{6}\.log$/.test(f))
    .sort()
    .reverse();
  return candidates.length ? path.join(dir, candidates[0]) : null;
}

function recordLevel(line: string): string | null {
  try {
    const obj: unknown = JSON.parse(line);
    if (typeof obj === 'object' && obj !== null && 'level' in obj && typeof obj.level === 'string') {
      return obj.level;
    }
  } catch {
    // not JSON; printed as-is
  }
  return null;
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('file', { type: 'string', describe: 'Explicit log file path' })
    .option('log-dir', { type: 'string', describe: 'Directory holding workflow logs' })
    .option('level', { type: 'string', choices: LOG_LEVELS, default: 'debug', describe: 'Min level filter' })
    .option('follow', { type: 'boolean', default: false, describe: 'Stream appended lines' })
    .parse();

  const logDir = argv['log-dir'] || ENV.logDir || path.join(ENV.baseDir, 'logs');
  const file = argv.file ?? latestRunLog(logDir);
  if (!file) {
    console.error('No workflow_*.log found in', logDir);
    process.exit(1);
  }
  if (!fs.existsSync(file)) {
    console.error('Log file does not exist:', file);
    process.exit(1);
  }
  const minOrder = levelOrder(isLogLevel(argv.level) ? argv.level : 'debug');

  const printLine = (line: string) => {
    line = line.trim();
    if (!line) return;
    const level = recordLevel(line);
    if (level === null || !isLogLevel(level) || levelOrder(level) >= minOrder) {
      process.stdout.write(line + '\n');
    }
  };

  fs.readFileSync(file, 'utf8').split(/\r?\n/).forEach(printLine);
  if (argv.follow) {
    tailFile(file, printLine);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
