export const SHEET_TIME_ZONE = "Asia/Kolkata";

/**
 * Formats a date as "YYYY-MM-DD HH:MM:SS" in the given IANA time zone (IST by default).
 */
export const formatTimestamp = (date: Date = new Date(), timeZone: string = SHEET_TIME_ZONE): string => {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  }).formatToParts(date);

  const get = (type: Intl.DateTimeFormatPartTypes): string => parts.find((part) => part.type === type)?.value ?? "00";

  return `${get("year")}-${get("month")}-${get("day")} ${get("hour")}:${get("minute")}:${get("second")}`;
};
