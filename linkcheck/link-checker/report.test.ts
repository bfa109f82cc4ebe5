import { describe, it, expect } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { csvField, printSummary, toCsv, writeCsvReport } from './report.ts';
import { createRunStatistics } from './stats.ts';
import { createLogger } from '../lib/output.ts';
import type { BrokenLinkRecord } from './types.ts';

const record: BrokenLinkRecord = {
  postTitle: 'Links, "Quotes" and More',
  postUrl: 'https://news.example.com/p/links',
  brokenLink: 'https://gone.example/a',
  reason: 'HTTP 404',
};

describe('csvField', () => {
  it('leaves plain values alone', () => {
    expect(csvField('HTTP 404')).toBe('HTTP 404');
  });

  it('quotes commas, quotes and newlines', () => {
    expect(csvField('a,b')).toBe('"a,b"');
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
    expect(csvField('line\nbreak')).toBe('"line\nbreak"');
  });
});

describe('toCsv', () => {
  it('writes a header and CRLF rows', () => {
    expect(toCsv([record])).toBe(
      'post_title,post_url,broken_link,error_type\r\n'
      + '"Links, ""Quotes"" and More",https://news.example.com/p/links,https://gone.example/a,HTTP 404\r\n',
    );
  });
});

describe('writeCsvReport', () => {
  it('writes the file when there are broken links', () => {
    const dir = mkdtempSync(join(tmpdir(), 'link-report-'));
    try {
      const file = join(dir, 'report.csv');
      expect(writeCsvReport([record], file)).toBe(true);
      expect(readFileSync(file, 'utf-8')).toBe(toCsv([record]));
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('writes nothing when there are no broken links', () => {
    const dir = mkdtempSync(join(tmpdir(), 'link-report-'));
    try {
      const file = join(dir, 'report.csv');
      expect(writeCsvReport([], file)).toBe(false);
      expect(existsSync(file)).toBe(false);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('printSummary', () => {
  it('prints every counter', () => {
    const lines: string[] = [];
    const logger = createLogger({ ciMode: true, write: (line) => lines.push(line) });
    const stats = { ...createRunStatistics(), postsChecked: 2, linksChecked: 9, cacheHits: 3, retries: 1 };

    printSummary(stats, 4, logger);

    expect(lines).toContain('SUMMARY');
    expect(lines).toContain('Posts checked:              2');
    expect(lines).toContain('Total links checked:        9');
    expect(lines).toContain('Cache hits:                 3');
    expect(lines).toContain('Retries performed:          1');
    expect(lines).toContain('Broken links found:         4');
    expect(lines.some((line) => line.startsWith('Internal check errors'))).toBe(false);
  });

  it('celebrates a clean run', () => {
    const lines: string[] = [];
    const logger = createLogger({ ciMode: true, write: (line) => lines.push(line) });
    printSummary(createRunStatistics(), 0, logger);
    expect(lines.at(-1)).toBe('\nNo broken links found!');
  });
});
