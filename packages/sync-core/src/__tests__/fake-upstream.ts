import type { IKlineSource, KlinePageRequest, RawKline } from '@klinevault/schemas';

export const HOUR = 60 * 60 * 1000;
export const JAN_1 = Date.UTC(2024, 0, 1);

/**
 * Hourly klines; volume is (hour of day + 1) so each day reads 1..24
 */
export function hourlyKlines(from: number, count: number): RawKline[] {
  return Array.from({ length: count }, (_, i) => {
    const openTime = from + i * HOUR;
    const volume = new Date(openTime).getUTCHours() + 1;
    return [
      openTime,
      '100.0',
      '110.0',
      '95.0',
      '105.0',
      volume.toString(),
      openTime + HOUR - 1,
      (volume * 100).toString(),
      10,
      (volume / 2).toString(),
      (volume * 50).toString(),
      '0',
    ];
  });
}

/**
 * In-process stand-in for the klines endpoint: serves rows whose open time
 * lies in [startTime, endTime], oldest first, at most `limit` per page
 */
export class FakeKlineSource implements IKlineSource {
  readonly requests: KlinePageRequest[] = [];
  failWith: Error | null = null;

  constructor(private readonly rows: RawKline[]) {}

  async getKlinePage(request: KlinePageRequest): Promise<RawKline[]> {
    this.requests.push(request);
    if (this.failWith) {
      throw this.failWith;
    }
    return this.rows
      .filter((row) => {
        const openTime = row[0];
        return (
          typeof openTime === 'number' &&
          openTime >= request.startTime &&
          (request.endTime === undefined || openTime <= request.endTime)
        );
      })
      .slice(0, request.limit);
  }
}
