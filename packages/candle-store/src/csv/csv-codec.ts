import { IntervalSchema, type CandleRecord } from '@klinevault/schemas';
import {
  formatInstant,
  parseIsoTimestamp,
  wallClockToUtc,
  zonedWallClockToUtc,
} from '@klinevault/utils';

/**
 * Column order of every file the store writes
 */
export const CSV_COLUMNS = [
  'timestamp',
  'open',
  'high',
  'low',
  'close',
  'volume',
  'quote_volume',
  'trades',
  'taker_buy_base',
  'taker_buy_quote',
  'interval',
  'symbol',
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

export const CSV_HEADER = CSV_COLUMNS.join(',');

/**
 * Raised for any file content that cannot be turned back into records
 */
export class CsvFormatError extends Error {
  constructor(
    message: string,
    readonly line: number | null = null
  ) {
    super(line === null ? message : `line ${line}: ${message}`);
    this.name = 'CsvFormatError';
  }
}

function quoteField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function numberCell(value: number | null): string {
  return value === null ? '' : String(value);
}

/**
 * Encode records as CSV text (header + one line per record, trailing newline)
 *
 * @param timeZone - Display zone for the timestamp column (null = UTC, 'Z' suffix)
 */
export function encodeCandles(records: readonly CandleRecord[], timeZone: string | null): string {
  const lines = [CSV_HEADER];
  for (const record of records) {
    const cells = [
      formatInstant(record.timestamp, timeZone),
      numberCell(record.open),
      numberCell(record.high),
      numberCell(record.low),
      numberCell(record.close),
      numberCell(record.volume),
      numberCell(record.quoteVolume),
      numberCell(record.tradeCount),
      numberCell(record.takerBuyBase),
      numberCell(record.takerBuyQuote),
      record.interval,
      record.symbol,
    ];
    lines.push(cells.map(quoteField).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Split CSV text into rows of fields (RFC 4180 quoting, LF or CRLF)
 *
 * Blank lines are dropped. Each row keeps the line number it started on.
 */
export function parseCsv(text: string): Array<{ line: number; fields: string[] }> {
  const rows: Array<{ line: number; fields: string[] }> = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let rowLine = 1;
  let i = 0;

  const endRow = (): void => {
    fields.push(field);
    if (fields.length > 1 || fields[0] !== '') {
      rows.push({ line: rowLine, fields });
    }
    fields = [];
    field = '';
  };

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === '') {
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      endRow();
      line++;
      rowLine = line;
    } else {
      field += ch;
    }
    i++;
  }

  if (inQuotes) {
    throw new CsvFormatError('unterminated quoted field', rowLine);
  }
  if (field !== '' || fields.length > 0) {
    endRow();
  }
  return rows;
}

/**
 * Parse a stored timestamp cell into an instant
 *
 * Accepts ISO-8601 with an offset, naive ISO date-times (read as wall-clock
 * time in the display zone) and bare epoch milliseconds.
 */
export function parseTimestampCell(cell: string, timeZone: string | null): number | null {
  const text = cell.trim();
  if (/^\d{10,}$/.test(text)) {
    return Number(text);
  }
  const parsed = parseIsoTimestamp(text);
  if (!parsed) {
    return null;
  }
  if (parsed.offsetMinutes !== null) {
    return wallClockToUtc(parsed.wallClock) - parsed.offsetMinutes * 60_000;
  }
  return timeZone ? zonedWallClockToUtc(parsed.wallClock, timeZone) : wallClockToUtc(parsed.wallClock);
}

function parseNumberCell(cell: string | undefined, column: string, line: number): number | null {
  const text = (cell ?? '').trim();
  if (text === '' || text.toLowerCase() === 'nan') {
    return null;
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new CsvFormatError(`${column} is not a number: "${text}"`, line);
  }
  return value;
}

/**
 * Decode CSV text produced by encodeCandles (or an older naive-timestamp file)
 *
 * Columns are matched by header name, so column order does not matter.
 *
 * @throws CsvFormatError on a missing column, bad timestamp or bad number
 */
export function decodeCandles(text: string, timeZone: string | null): CandleRecord[] {
  const rows = parseCsv(text.replace(/^\uFEFF/, ''));
  const header = rows.shift();
  if (!header) {
    return [];
  }

  const index = new Map<string, number>();
  header.fields.forEach((name, position) => index.set(name.trim().toLowerCase(), position));

  const column = (name: CsvColumn): number => {
    const position = index.get(name);
    if (position === undefined) {
      throw new CsvFormatError(`missing column "${name}"`, header.line);
    }
    return position;
  };

  const positions = {
    timestamp: column('timestamp'),
    open: column('open'),
    high: column('high'),
    low: column('low'),
    close: column('close'),
    volume: column('volume'),
    quoteVolume: column('quote_volume'),
    trades: column('trades'),
    takerBuyBase: column('taker_buy_base'),
    takerBuyQuote: column('taker_buy_quote'),
    interval: column('interval'),
    symbol: column('symbol'),
  };

  return rows.map(({ line, fields }) => {
    const cell = (position: number): string => fields[position] ?? '';

    const timestamp = parseTimestampCell(cell(positions.timestamp), timeZone);
    if (timestamp === null) {
      throw new CsvFormatError(`invalid timestamp "${cell(positions.timestamp)}"`, line);
    }

    const trades = parseNumberCell(cell(positions.trades), 'trades', line);
    if (trades !== null && !Number.isInteger(trades)) {
      throw new CsvFormatError(`trades is not an integer: "${cell(positions.trades)}"`, line);
    }

    const symbol = cell(positions.symbol).trim();
    if (!symbol) {
      throw new CsvFormatError('symbol is required', line);
    }
    const interval = IntervalSchema.safeParse(cell(positions.interval).trim());
    if (!interval.success) {
      throw new CsvFormatError(`unknown interval "${cell(positions.interval)}"`, line);
    }

    return {
      timestamp,
      symbol,
      interval: interval.data,
      open: parseNumberCell(cell(positions.open), 'open', line),
      high: parseNumberCell(cell(positions.high), 'high', line),
      low: parseNumberCell(cell(positions.low), 'low', line),
      close: parseNumberCell(cell(positions.close), 'close', line),
      volume: parseNumberCell(cell(positions.volume), 'volume', line),
      quoteVolume: parseNumberCell(cell(positions.quoteVolume), 'quote_volume', line),
      tradeCount: trades,
      takerBuyBase: parseNumberCell(cell(positions.takerBuyBase), 'taker_buy_base', line),
      takerBuyQuote: parseNumberCell(cell(positions.takerBuyQuote), 'taker_buy_quote', line),
    };
  });
}
