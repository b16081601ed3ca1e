import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { isLogLevel, levelOrder } from '../pipeline/log';

function tailFile(file: string, printLine: (line: string) => void) {
  let size = fs.statSync(file).size;
  let pending = '';
  setInterval(() => {
    let stat: fs.Stats;
    try {
      stat = fs.statSync(file);
    } catch (e) {
      console.error('Cannot stat log file', file, e);
      return;
    }
    if (stat.size <= size) return;
    const stream = fs.createReadStream(file, { start: size, end: stat.size - 1, encoding: 'utf8' });
    stream.on('data', (chunk) => {
      const lines = (pending + String(chunk)).split(/\r?\n/);
      pending = lines.pop() ?? '';
      lines.forEach(printLine);
    });
    size = stat.size;
  }, 1500);
}

function latestRunLog(dir: string): string | null {
  if (!fs.existsSync(dir)) return null;
  const candidates = fs
    .readdirSync(dir)
    .filter((f) => /^run-\d+\.log$/.test(f))
    .sort()
    .reverse();
  return candidates.length ? path.join(dir, candidates[0]) : null;
}

function levelOf(line: string): string | null {
  try {
    const obj: unknown = JSON.parse(line);
    if (obj && typeof obj === 'object' && 'level' in obj && typeof obj.level === 'string') return obj.level;
  } catch {
    // not JSON; printed as-is
  }
  return null;
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('job', { type: 'string', describe: 'Job name (input basename) whose latest run log to show' })
    .option('file', { type: 'string', describe: 'Explicit log file path' })
    .option('level', { type: 'string', default: 'debug', describe: 'Min level filter (debug|info|warn|error)' })
    .option('follow', { type: 'boolean', default: false, describe: 'Stream appended lines' })
    .check((a) => a.job !== undefined || a.file !== undefined || 'Provide --job or --file')
    .parse();

  const file = argv.file ?? latestRunLog(path.resolve(ENV.artifactsRoot, String(argv.job)));
  if (!file) {
    console.error('No run-*.log found for job', argv.job);
    process.exit(1);
  }
  if (!fs.existsSync(file)) {
    console.error('Log file does not exist:', file);
    process.exit(1);
  }
  const minOrder = levelOrder(isLogLevel(argv.level) ? argv.level : 'debug');

  const printLine = (raw: string) => {
    const line = raw.trim();
    if (!line) return;
    const level = levelOf(line);
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
