import axios, { AxiosInstance } from "axios";
import { DateTime } from "luxon";
import { z } from "zod";
import { HOLIDAYS_TIMEOUT_MS, HOLIDAYS_URL } from "../config";
import { HolidayList, HolidayProvider } from "../types";

const HolidayRecordSchema = z.object({
  date: z.string(),
  localName: z.string().nullish(),
  name: z.string().nullish()
});

const HolidayResponseSchema = z.array(z.unknown());

export interface HolidayFetchOptions {
  baseUrl?: string;
  timeout?: number;
  http?: AxiosInstance;
}

// "2024-01-01" and "2024" both resolve to 2024
export function holidayYear(date: string): string {
  const parsed = DateTime.fromISO(date, { zone: "utc" });
  if (parsed.isValid) return String(parsed.year);
  return date.split("-")[0];
}

export async function fetchHolidayNames(
  date: string,
  countryCode: string,
  { baseUrl = HOLIDAYS_URL, timeout = HOLIDAYS_TIMEOUT_MS, http = axios }: HolidayFetchOptions = {}
): Promise<HolidayList> {
  const year = holidayYear(date);
  const url = `${baseUrl.replace(/\/+$/, "")}/PublicHolidays/${encodeURIComponent(year)}/${encodeURIComponent(
    countryCode.toUpperCase()
  )}`;

  try {
    const resp = await http.get<unknown>(url, { timeout });
    const records = HolidayResponseSchema.parse(resp.data).flatMap((item) => {
      const record = HolidayRecordSchema.safeParse(item);
      return record.success ? [record.data] : [];
    });
    return records
      .filter((record) => record.date === date)
      .map((record) => record.localName || record.name || "")
      .filter((name) => name.length > 0);
  } catch (err) {
    console.warn("Failed to fetch holidays", err instanceof Error ? err.message : String(err));
    return [];
  }
}

export function createHolidayProvider(options: HolidayFetchOptions): HolidayProvider {
  return (date, countryCode) => fetchHolidayNames(date, countryCode, options);
}
