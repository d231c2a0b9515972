import { parseFeedDate } from "./feedDates";

describe("parseFeedDate", () => {
  it.each([
    ["Mon, 02 Jan 2006 15:04:05 GMT", "2006-01-02T15:04:05.000Z"],
    ["Mon, 02 Jan 2006 15:04:05 -0700", "2006-01-02T22:04:05.000Z"],
    ["Mon, 02 Jan 2006 15:04:05 EST", "2006-01-02T20:04:05.000Z"],
    ["2006-01-02T15:04:05Z", "2006-01-02T15:04:05.000Z"],
    ["2006-01-02T15:04:05+07:00", "2006-01-02T08:04:05.000Z"],
    ["2006-01-02T15:04:05.250Z", "2006-01-02T15:04:05.250Z"],
    ["2024-03-10", "2024-03-10T00:00:00.000Z"],
    ["2024-03-10 08:30", "2024-03-10T08:30:00.000Z"],
    ["2024-03-10T08:30:15", "2024-03-10T08:30:15.000Z"],
    ["  2024-03-10  ", "2024-03-10T00:00:00.000Z"],
  ])("parses %s", (raw, expected) => {
    expect(parseFeedDate(raw)?.toISOString()).toBe(expected);
  });

  it.each([undefined, "", "   ", "not a date", "1", "yesterday at noon"])(
    "returns undefined for %p",
    (raw) => {
      expect(parseFeedDate(raw)).toBeUndefined();
    }
  );
});
