export interface CycleResult {
  success: boolean;
  /** Distinct fetchable tickers found in the header row */
  tickers: number;
  fetched: number;
  /** Tickers whose attempts were all used up */
  failed: number;
  /** Tickers left unfinished because the cycle was aborted */
  cancelled: number;
  exchangeRate: number | null;
  cellsWritten: number;
  startedAt: Date;
  finishedAt: Date;
}

export interface MarketStatus {
  open: boolean;
  timezone: string;
  localTime: string;
  nextOpen: Date | null;
  nextUpdate: Date | null;
  lastUpdate: Date | null;
}
