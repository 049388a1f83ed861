import fs from 'fs';
import path from 'path';
import { loadJournal, rowsToCsv, runsToCsv, summarizeRun } from '../journal/RunSummary';
import type { RunReportEntry } from '../journal/RunSummary';
import { log, logError } from '../utils/logger';

const OUT_DIR = String(process.env.SUMMARY_OUT_DIR || path.join('data', 'processed'));

function summarizeFile(file: string): RunReportEntry | null {
  const { rows, skipped } = loadJournal(fs.readFileSync(file, 'utf8'));
  const stats = summarizeRun(rows);
  if (!stats) {
    log('SUMMARY_EMPTY', { file, skipped });
    return null;
  }

  fs.mkdirSync(OUT_DIR, { recursive: true });
  const base = path.basename(file, '.jsonl');
  const summaryPath = path.join(OUT_DIR, `${base}_summary.json`);
  const csvPath = path.join(OUT_DIR, `${base}_steps.csv`);
  fs.writeFileSync(summaryPath, JSON.stringify({ ...stats, sourceFile: path.basename(file), skippedLines: skipped }, null, 2), 'utf8');
  fs.writeFileSync(csvPath, rowsToCsv(rows), 'utf8');
  log('SUMMARY_WRITTEN', { file, summaryPath, csvPath, steps: stats.totalSteps, finalPnl: stats.finalPnl });
  return { sourceFile: path.basename(file), stats };
}

function main(): void {
  const target = process.argv[2] || path.join('data', 'raw');
  const isDirectory = fs.statSync(target).isDirectory();
  const files = isDirectory
    ? fs.readdirSync(target).filter((f) => f.endsWith('.jsonl')).sort().map((f) => path.join(target, f))
    : [target];

  if (files.length === 0) {
    log('SUMMARY_NO_FILES', { target });
    return;
  }
  const entries = files.flatMap((file) => {
    const entry = summarizeFile(file);
    return entry ? [entry] : [];
  });

  if (isDirectory && entries.length > 0) {
    const reportPath = path.join(OUT_DIR, 'summary_report.csv');
    fs.writeFileSync(reportPath, runsToCsv(entries), 'utf8');
    log('SUMMARY_REPORT_WRITTEN', { reportPath, runs: entries.length });
  }
}

try {
  main();
} catch (err) {
  logError('SUMMARY_FAILED', err);
  process.exit(1);
}
