/**
 * Kasa device types
 */

/**
 * Raw usage assembled from one Kasa poll, before normalization.
 * power_mw is milliwatts; today is kilowatt-hours, or a falsy value when not reported.
 * today_wh, when present, is the same figure as reported in watt-hours and wins over today.
 */
export interface KasaRawUsage {
  power_mw: unknown;
  today: unknown;
  today_wh?: unknown;
}

/**
 * Today's energy from get_daystat, in whichever unit the hardware reported it
 */
export type KasaTodayEnergy = { today: number } | { today_wh: number };

/**
 * Emeter entry of get_daystat. Older hardware reports kWh in `energy`,
 * newer hardware reports Wh in `energy_wh`.
 */
export interface KasaDayStat {
  year: number;
  month: number;
  day: number;
  energy?: number;
  energy_wh?: number;
}

/**
 * A connected Kasa device, whichever protocol it was reached over
 */
export interface KasaHandle {
  readonly protocol: 'legacy' | 'klap';
  getRealtime(): Promise<unknown>;
  getDayStats(year: number, month: number): Promise<unknown>;
  close(): void;
}
