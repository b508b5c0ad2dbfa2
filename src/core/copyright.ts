// Copyright notice normalisation and merging.
// Stored form is "<years> <holder>": the "Copyright"/©/(C) prefix is not kept.

import { sortedUnique } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type YearRange = {
  start: number;
  /** Numeric end year, or a word such as "Present". Absent for a single year. */
  end?: number | string;
};

export type CopyrightNotice = {
  years: YearRange[];
  holder: string;
};

// The bare word needs a boundary; a glyph may touch the year.
const PREFIX_PATTERN = /^(?:Copyright\s*(?:©|\([Cc]\)):?|Copyright(?::|(?=\s|$))|©|\([Cc]\))\s*/;
const YEAR_TOKEN = /^(\d{4})(?:\s*(--|-|–)\s*(\d{4}|[Pp]resent|[Nn]ow)?)?(?=[\s,]|$)/;

// =============================================================================
// PARSING
// =============================================================================

export function parseCopyrightNotice(text: string): CopyrightNotice {
  let rest = text.trim().replace(PREFIX_PATTERN, "");
  const years: YearRange[] = [];

  for (;;) {
    const candidate = rest.replace(/^[\s,]+/, "");
    const match = YEAR_TOKEN.exec(candidate);
    if (!match) break;

    const [token, start, separator, end] = match;
    if (separator && end) {
      years.push({ start: Number(start), end: /^\d{4}$/.test(end) ? Number(end) : end });
    } else {
      // A separator with no end year is dropped; the year itself stays.
      years.push({ start: Number(start) });
    }
    rest = candidate.slice(token.length);
  }

  const holder = (years.length > 0 ? rest.replace(/^[\s,]+/, "") : rest).trim();
  return { years, holder };
}

export function renderCopyrightNotice(notice: CopyrightNotice): string {
  const years = notice.years.map(renderYearRange).join(", ");
  return [years, notice.holder].filter((part) => part.length > 0).join(" ");
}

export function normalizeCopyrightText(text: string): string {
  return renderCopyrightNotice(parseCopyrightNotice(text));
}

// =============================================================================
// MERGING
// =============================================================================

/**
 * Collapses notices of the same holder into one line spanning the earliest
 * start year to the latest end year. Notices without a year are kept as-is
 * unless another notice of the same holder carries years.
 */
export function mergeCopyrightLines(lines: readonly string[]): string[] {
  const byHolder = new Map<string, CopyrightNotice[]>();
  for (const line of lines) {
    const notice = parseCopyrightNotice(line);
    const group = byHolder.get(notice.holder) ?? [];
    group.push(notice);
    byHolder.set(notice.holder, group);
  }

  const merged: string[] = [];
  for (const [holder, notices] of byHolder) {
    const ranges = notices.flatMap((notice) => notice.years);
    if (ranges.length === 0) {
      merged.push(holder);
      continue;
    }
    merged.push(renderCopyrightNotice({ years: [spanOf(ranges)], holder }));
  }

  return sortedUnique(merged);
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderYearRange(range: YearRange): string {
  return range.end === undefined ? String(range.start) : `${range.start}-${range.end}`;
}

function spanOf(ranges: YearRange[]): YearRange {
  const start = Math.min(...ranges.map((range) => range.start));
  const openEnd = ranges.find((range) => typeof range.end === "string")?.end;
  const latest = Math.max(
    ...ranges.map((range) => (typeof range.end === "number" ? range.end : range.start)),
  );

  if (openEnd !== undefined) {
    return { start, end: openEnd };
  }
  return latest === start ? { start } : { start, end: latest };
}
