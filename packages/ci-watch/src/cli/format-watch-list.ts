import invariant from 'tiny-invariant';
import type { WatchedPR } from '../types.ts';

const TITLE_MAX_LENGTH = 50;
const COLUMN_GAP = 2;

export interface WatchListEntry {
  owner: string;
  repo: string;
  number: number;
  status: string;
  last_checked?: string;
  title?: string;
}

export function formatWatchListTable(prs: readonly WatchedPR[]): string {
  const rows = [
    ['REPO', 'PR', 'STATUS', 'LAST CHECKED', 'TITLE'],
    ['----', '--', '------', '------------', '-----'],
    ...prs.map((pr) => [
      `${pr.owner}/${pr.repo}`,
      `#${pr.number}`,
      pr.lastKnownState === '' ? 'unknown' : pr.lastKnownState,
      pr.lastCheckedAt === null ? 'never' : formatLocalMinute(new Date(pr.lastCheckedAt)),
      truncateTitle(pr.title),
    ]),
  ];

  return `${alignColumns(rows).join('\n')}\n`;
}

export function buildWatchListEntries(prs: readonly WatchedPR[]): WatchListEntry[] {
  return prs.map((pr) => ({
    owner: pr.owner,
    repo: pr.repo,
    number: pr.number,
    status: pr.lastKnownState === '' ? 'unknown' : pr.lastKnownState,
    ...(pr.lastCheckedAt === null ? {} : { last_checked: pr.lastCheckedAt }),
    ...(pr.title === '' ? {} : { title: pr.title }),
  }));
}

export function truncateTitle(title: string): string {
  return title.length > TITLE_MAX_LENGTH ? `${title.slice(0, TITLE_MAX_LENGTH - 3)}...` : title;
}

// YYYY-MM-DD HH:mm in the local time zone
function formatLocalMinute(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

function alignColumns(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }

  return rows.map((row) =>
    row
      .map((cell, index) => {
        if (index === row.length - 1) {
          return cell;
        }
        const width = widths[index];
        invariant(width !== undefined, 'column width must exist for every cell');
        return cell.padEnd(width + COLUMN_GAP);
      })
      .join(''),
  );
}
