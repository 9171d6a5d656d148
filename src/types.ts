export type Idea = {
  title: string;
  description: string;
};

export interface IdeaRequest {
  industry: string;
  date: string; // free-form, usually YYYY-MM-DD or YYYY
  country: string; // ISO 3166-1 alpha-2, e.g. PL
}

export interface ApiResponseError {
  error: string;
}

export type HolidayList = string[]; // holiday names on the requested date

export type HolidayProvider = (date: string, countryCode: string) => Promise<HolidayList>;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export function isIdeaList(value: JsonValue): value is Idea[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item) =>
        typeof item === "object" &&
        item !== null &&
        !Array.isArray(item) &&
        typeof item.title === "string" &&
        typeof item.description === "string"
    )
  );
}
