import { load } from 'cheerio';
import { LOTTO_CONFIG } from '../../constants/lotto.config';
import { FetchError, Result, err, ok } from '../../interfaces/fetch-result.interface';
import { FrequencyRecord } from '../../interfaces/stats.interface';
import { isCompleteDataset, sortByNumber } from '../../utils/dataset.util';

export interface StatsTableLayout {
  marker: string;
  minColumns: number;
  numberColumn: number;
  countColumn: number;
}

const DEFAULT_LAYOUT: StatsTableLayout = LOTTO_CONFIG.table;

/**
 * Integer from a table cell ("1,102", " 45 "), or null for anything else
 */
export function parseIntegerCell(text: string | undefined): number | null {
  if (text === undefined) return null;
  const cleaned = text.replace(/[\s,]/g, '');
  if (!/^\d+$/.test(cleaned)) return null;
  return Number.parseInt(cleaned, 10);
}

/**
 * Parse the per-number statistics page.
 *
 * The table is located by its win-count marker, not by position, since the page
 * layout shifts. Columns are read positionally (number = 1st, count = 3rd) after
 * asserting the table is wide enough. Rows that do not coerce to integers are
 * dropped (header remnants, spacer rows). Anything short of the full 1..45
 * table is a failure: there is no partial result.
 */
export function parseStatsTable(
  html: string,
  layout: StatsTableLayout = DEFAULT_LAYOUT,
): Result<FrequencyRecord[], FetchError> {
  const $ = load(html);

  // Innermost table holding the marker, so wrapping layout tables are skipped
  const table = $('table')
    .filter((_, el) => {
      const $el = $(el);
      if (!$el.text().includes(layout.marker)) return false;
      return $el.find('table').filter((__, inner) => $(inner).text().includes(layout.marker)).length === 0;
    })
    .first();

  if (table.length === 0) {
    return err({ kind: 'table-not-found' });
  }

  const rows = table
    .find('tr')
    .toArray()
    .map((tr) =>
      $(tr)
        .children('th, td')
        .toArray()
        .map((cell) => $(cell).text().trim()),
    );

  const widest = rows.reduce((max, cells) => Math.max(max, cells.length), 0);
  if (widest < layout.minColumns) {
    return err({ kind: 'table-shape', columns: widest });
  }

  const records: FrequencyRecord[] = [];
  for (const cells of rows) {
    if (cells.length < layout.minColumns) continue;

    const number = parseIntegerCell(cells[layout.numberColumn]);
    const count = parseIntegerCell(cells[layout.countColumn]);
    if (number === null || count === null) continue;

    records.push({ number, count });
  }

  if (!isCompleteDataset(records)) {
    return err({ kind: 'row-count', rows: records.length });
  }

  return ok(sortByNumber(records));
}
