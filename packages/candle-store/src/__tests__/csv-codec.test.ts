import { describe, it, expect } from 'vitest';
import {
  CSV_HEADER,
  CsvFormatError,
  decodeCandles,
  encodeCandles,
  parseCsv,
} from '../csv/csv-codec';
import { candle, JAN_1 } from './fixtures';

describe('encodeCandles()', () => {
  it('writes the header and empty cells for nulls', () => {
    const text = encodeCandles(
      [
        candle(JAN_1, {
          open: 1.5,
          high: 2,
          low: 1,
          close: 1.75,
          volume: 10.25,
          quoteVolume: null,
          tradeCount: 7,
          takerBuyBase: 0.1,
          takerBuyQuote: null,
        }),
      ],
      null
    );

    expect(text).toBe(
      [
        'timestamp,open,high,low,close,volume,quote_volume,trades,taker_buy_base,taker_buy_quote,interval,symbol',
        '2024-01-01T00:00:00Z,1.5,2,1,1.75,10.25,,7,0.1,,1h,BTCUSDT',
        '',
      ].join('\n')
    );
  });

  it('renders timestamps in the display zone with an offset', () => {
    const text = encodeCandles([candle(JAN_1)], 'Asia/Kolkata');
    const dataLine = text.split('\n')[1];
    expect(dataLine?.startsWith('2024-01-01T05:30:00+05:30,')).toBe(true);
  });

  it('quotes fields containing separators or quotes', () => {
    const text = encodeCandles([candle(JAN_1, { symbol: 'A,"B"' })], null);
    expect(text.split('\n')[1]?.endsWith(',1h,"A,""B"""')).toBe(true);
  });

  it('writes only the header for no records', () => {
    expect(encodeCandles([], null)).toBe(`${CSV_HEADER}\n`);
  });
});

describe('decodeCandles()', () => {
  it('reads back what was written, including nulls and zoned timestamps', () => {
    const records = [
      candle(JAN_1, { volume: 0.1 + 0.2, quoteVolume: null, tradeCount: null }),
      candle(JAN_1 + 3_600_000, { symbol: 'X,Y' }),
    ];
    for (const zone of [null, 'Asia/Kolkata', 'America/New_York']) {
      expect(decodeCandles(encodeCandles(records, zone), zone)).toEqual(records);
    }
  });

  it('reads naive timestamps as wall-clock time in the display zone', () => {
    const text = `${CSV_HEADER}\n2024-01-01 05:30:00,1,1,1,1,1,1,1,1,1,1h,BTCUSDT\n`;
    expect(decodeCandles(text, 'Asia/Kolkata')[0]?.timestamp).toBe(JAN_1);
    expect(decodeCandles(text, null)[0]?.timestamp).toBe(JAN_1 + 5.5 * 3_600_000);
  });

  it('accepts epoch milliseconds and any column order', () => {
    const text = [
      'symbol,interval,timestamp,volume,open,high,low,close,quote_volume,trades,taker_buy_base,taker_buy_quote',
      `ETHUSDT,5m,${JAN_1},3,1,2,0.5,1.5,,,,`,
    ].join('\r\n');
    expect(decodeCandles(text, null)).toEqual([
      {
        timestamp: JAN_1,
        symbol: 'ETHUSDT',
        interval: '5m',
        open: 1,
        high: 2,
        low: 0.5,
        close: 1.5,
        volume: 3,
        quoteVolume: null,
        tradeCount: null,
        takerBuyBase: null,
        takerBuyQuote: null,
      },
    ]);
  });

  it('returns nothing for an empty file', () => {
    expect(decodeCandles('', null)).toEqual([]);
    expect(decodeCandles(`${CSV_HEADER}\n`, null)).toEqual([]);
  });

  it('rejects a missing column', () => {
    expect(() => decodeCandles('timestamp,open\n2024-01-01,1\n', null)).toThrow(
      'line 1: missing column "high"'
    );
  });

  it('rejects bad timestamps, numbers and intervals with the line number', () => {
    expect(() =>
      decodeCandles(`${CSV_HEADER}\nyesterday,1,1,1,1,1,1,1,1,1,1h,BTCUSDT\n`, null)
    ).toThrow('line 2: invalid timestamp "yesterday"');
    expect(() =>
      decodeCandles(`${CSV_HEADER}\n2024-01-01,abc,1,1,1,1,1,1,1,1,1h,BTCUSDT\n`, null)
    ).toThrow('line 2: open is not a number: "abc"');
    expect(() =>
      decodeCandles(`${CSV_HEADER}\n2024-01-01,1,1,1,1,1,1,1.5,1,1,1h,BTCUSDT\n`, null)
    ).toThrow('line 2: trades is not an integer: "1.5"');
    expect(() =>
      decodeCandles(`${CSV_HEADER}\n2024-01-01,1,1,1,1,1,1,1,1,1,7h,BTCUSDT\n`, null)
    ).toThrow(CsvFormatError);
  });
});

describe('parseCsv()', () => {
  it('handles quotes, escaped quotes, CRLF and blank lines', () => {
    expect(parseCsv('a,"b,c","d ""e"""\r\n\r\nf,,g\n')).toEqual([
      { line: 1, fields: ['a', 'b,c', 'd "e"'] },
      { line: 3, fields: ['f', '', 'g'] },
    ]);
  });

  it('keeps newlines inside quoted fields', () => {
    expect(parseCsv('"x\ny",z\nw,v')).toEqual([
      { line: 1, fields: ['x\ny', 'z'] },
      { line: 3, fields: ['w', 'v'] },
    ]);
  });

  it('rejects an unterminated quote', () => {
    expect(() => parseCsv('a,"b\n')).toThrow('line 1: unterminated quoted field');
  });
});
