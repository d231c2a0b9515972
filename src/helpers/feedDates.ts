const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME_NO_ZONE =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?$/;

// Date.parse accepts lone numbers such as "1" as a year.
const MIN_DIGITS = 6;

/**
 * Parses the timestamp forms found in feeds: RFC 822/1123 (pubDate),
 * RFC 3339 (Atom), and bare `YYYY-MM-DD[ HH:MM[:SS]]`, which are taken as
 * UTC. Returns undefined for anything else.
 */
export function parseFeedDate(raw: string | undefined): Date | undefined {
  const value = raw?.trim();
  if (!value) {
    return undefined;
  }

  const dateOnly = DATE_ONLY.exec(value);
  if (dateOnly) {
    return validDate(
      Date.UTC(Number(dateOnly[1]), Number(dateOnly[2]) - 1, Number(dateOnly[3]))
    );
  }

  const noZone = DATE_TIME_NO_ZONE.exec(value);
  if (noZone) {
    return validDate(
      Date.UTC(
        Number(noZone[1]),
        Number(noZone[2]) - 1,
        Number(noZone[3]),
        Number(noZone[4]),
        Number(noZone[5]),
        Number(noZone[6] ?? "0")
      )
    );
  }

  if ((value.match(/\d/g) ?? []).length < MIN_DIGITS) {
    return undefined;
  }

  return validDate(Date.parse(value));
}

function validDate(millis: number): Date | undefined {
  return Number.isNaN(millis) ? undefined : new Date(millis);
}
