import type { EndpointMap } from './endpoints.js';
import { unique } from './ports.js';

export const NO_PORTS_MESSAGE = 'No exposed ports detected';
export const TABLE_TITLE = '📋 Service URLs:';
export const TABLE_HINT = '💡 Open or copy the URLs above to reach your deployed services.';

const FIRST_URL_GLYPH = '✅';
const WARNING_GLYPH = '⚠️';
const NO_PORTS_TEXT = '(no exposed ports)';
// Emoji render two columns wide whatever their code unit count
const GLYPH_WIDTH = 2;
const GLYPH_CELL = GLYPH_WIDTH + 1;

const MIN_SERVICE_WIDTH = 15;
const MAX_SERVICE_WIDTH = 35;
const MIN_URL_WIDTH = 25;
const MIN_PREFIX_LENGTH = 3;

interface ServiceRow {
  displayName: string;
  urls: string[];
}

function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function findCommonPrefix(names: readonly string[]): string {
  if (names.length < 2) return '';

  let prefix = names[0];
  for (const name of names.slice(1)) {
    while (prefix && !name.startsWith(prefix)) {
      prefix = prefix.slice(0, -1);
    }
    if (!prefix) break;
  }
  return prefix;
}

// Strip a shared prefix such as "myapp-" so the table shows "web-1", "db-1"
export function shortenServiceNames(names: readonly string[]): string[] {
  const prefix = findCommonPrefix(names);
  if (prefix.length < MIN_PREFIX_LENGTH || names.length < 2) {
    return [...names];
  }

  const shortened = names.map((name) => name.slice(prefix.length).replace(/^[-_.]+/, '') || name);

  // Names that would become indistinguishable keep their full form
  const counts = new Map<string, number>();
  for (const name of shortened) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return shortened.map((name, index) => ((counts.get(name) ?? 0) > 1 ? names[index] : name));
}

// Width in code points, so astral and accented characters count once
export function textWidth(text: string): number {
  return [...text].length;
}

function padText(text: string, width: number): string {
  return `${text}${' '.repeat(Math.max(0, width - textWidth(text)))}`;
}

function fitServiceName(name: string, width: number): string {
  return textWidth(name) > width ? `${[...name].slice(0, width - 3).join('')}...` : padText(name, width);
}

// Pad a cell that starts with a two-column glyph
function glyphCell(glyph: string, text: string, width: number): string {
  return `${glyph} ${padText(text, width - GLYPH_CELL)}`;
}

function border(left: string, middle: string, right: string, serviceWidth: number, urlWidth: number): string {
  return `${left}${'─'.repeat(serviceWidth + 2)}${middle}${'─'.repeat(urlWidth + 2)}${right}`;
}

export function formatEndpointTable(endpoints: EndpointMap): string {
  if (endpoints.size === 0) {
    return NO_PORTS_MESSAGE;
  }

  const names = [...endpoints.keys()];
  const displayNames = shortenServiceNames(names);
  const rows: ServiceRow[] = names
    .map((name, index) => ({
      displayName: displayNames[index],
      urls: unique(endpoints.get(name) ?? []).sort(compareOrdinal),
    }))
    .sort((a, b) => compareOrdinal(a.displayName, b.displayName));

  const longestName = Math.max(...rows.map((row) => textWidth(row.displayName)));
  const serviceWidth = Math.min(Math.max(MIN_SERVICE_WIDTH, longestName), MAX_SERVICE_WIDTH);

  const longestCell = Math.max(
    ...rows.flatMap((row) =>
      row.urls.length > 0
        ? row.urls.map((url) => textWidth(url) + GLYPH_CELL)
        : [textWidth(NO_PORTS_TEXT) + GLYPH_CELL]
    )
  );
  const urlWidth = Math.max(longestCell, MIN_URL_WIDTH);

  const lines = [
    TABLE_TITLE,
    border('┌', '┬', '┐', serviceWidth, urlWidth),
    `│ ${'Service'.padEnd(serviceWidth)} │ ${'URL'.padEnd(urlWidth)} │`,
    border('├', '┼', '┤', serviceWidth, urlWidth),
  ];

  for (const row of rows) {
    const name = fitServiceName(row.displayName, serviceWidth);

    if (row.urls.length === 0) {
      lines.push(`│ ${name} │ ${glyphCell(WARNING_GLYPH, NO_PORTS_TEXT, urlWidth)} │`);
      continue;
    }

    row.urls.forEach((url, index) => {
      const serviceCell = index === 0 ? name : ''.padEnd(serviceWidth);
      const urlCell =
        index === 0
          ? glyphCell(FIRST_URL_GLYPH, url, urlWidth)
          : padText(`${' '.repeat(GLYPH_CELL)}${url}`, urlWidth);
      lines.push(`│ ${serviceCell} │ ${urlCell} │`);
    });
  }

  lines.push(border('└', '┴', '┘', serviceWidth, urlWidth));

  if (rows.some((row) => row.urls.length > 0)) {
    lines.push(TABLE_HINT);
  }

  return lines.join('\n');
}
