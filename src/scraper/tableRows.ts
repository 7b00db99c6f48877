/**
 * HTML Table Extraction
 * 
 * Turns an HTML table into plain row records so that the page walkers can be
 * written as pure folds over data instead of DOM traversals.
 */

import { JSDOM } from 'jsdom';

export interface TableCell {
  text: string;
  hrefs: string[];
}

export interface TableRow {
  /** First header cell of the row, if any */
  header: { text: string; classes: string[] } | null;
  /** Data cells (td) in document order */
  cells: TableCell[];
}

/**
 * One step of a table walk: consumes a row, returns the next state and
 * optionally one parsed record
 */
export type RowStep<S, R> = (state: S, row: TableRow) => [S, R | null];

function cellText(el: Element): string {
  return (el.textContent ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Extracts the rows of the first table matching `selector`
 * 
 * @returns null when the page has no such table
 */
export function extractTableRows(html: string, selector: string): TableRow[] | null {
  const { document } = new JSDOM(html).window;
  const table = document.querySelector(selector);
  if (!table) return null;

  return Array.from(table.querySelectorAll('tr')).map((tr): TableRow => {
    const th = tr.querySelector('th');
    const cells = Array.from(tr.children)
      .filter(el => el.tagName === 'TD')
      .map(td => ({
        text: cellText(td),
        hrefs: Array.from(td.querySelectorAll('a'))
          .map(a => a.getAttribute('href'))
          .filter((h): h is string => h !== null)
      }));

    return {
      header: th ? { text: cellText(th), classes: Array.from(th.classList) } : null,
      cells
    };
  });
}

/**
 * Threads state through every row and collects the records the step emits
 */
export function foldRows<S, R>(rows: TableRow[], initial: S, step: RowStep<S, R>): { state: S; records: R[] } {
  let state = initial;
  const records: R[] = [];
  for (const row of rows) {
    const [next, record] = step(state, row);
    state = next;
    if (record !== null) records.push(record);
  }
  return { state, records };
}
