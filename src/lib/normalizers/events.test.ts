import { describe, expect, it } from "vitest";
import { EventDocumentError, normalizeEventDoc, toDateOrNull } from "./events";

describe("toDateOrNull", () => {
  it("unwraps timestamp-like values", () => {
    const at = new Date("2026-06-01T20:00:00.000Z");
    expect(toDateOrNull({ toDate: () => at })).toBe(at);
  });

  it("parses ISO strings and epoch milliseconds", () => {
    expect(toDateOrNull("2026-06-01T20:00:00.000Z")?.toISOString()).toBe("2026-06-01T20:00:00.000Z");
    expect(toDateOrNull(Date.UTC(2026, 5, 1))?.toISOString()).toBe("2026-06-01T00:00:00.000Z");
  });

  it("treats malformed values as absent", () => {
    expect(toDateOrNull("next friday")).toBeNull();
    expect(toDateOrNull("")).toBeNull();
    expect(toDateOrNull({ seconds: 12 })).toBeNull();
    expect(toDateOrNull(new Date(Number.NaN))).toBeNull();
    expect(
      toDateOrNull({
        toDate: () => {
          throw new Error("bad timestamp");
        },
      })
    ).toBeNull();
  });
});

describe("normalizeEventDoc", () => {
  it("maps stored field names onto the catalog shape", () => {
    const event = normalizeEventDoc("evt-1", {
      title: "Rooftop Sessions",
      description: "Live set",
      date: "2026-06-12T19:00:00.000Z",
      venue: "Pier 4",
      created_at: "2026-05-01T08:00:00.000Z",
      registration_deadline: "2026-06-10T23:59:00.000Z",
      genres: ["Rock", " Pop ", 3, ""],
      capacity: 120.7,
      note: "Bring ID",
      spotify_artist_id: "artist-ref-1",
    });

    expect(event).toEqual({
      id: "evt-1",
      title: "Rooftop Sessions",
      description: "Live set",
      date: new Date("2026-06-12T19:00:00.000Z"),
      location: "Pier 4",
      createdAt: new Date("2026-05-01T08:00:00.000Z"),
      registrationDeadline: new Date("2026-06-10T23:59:00.000Z"),
      genres: ["Rock", "Pop"],
      capacity: 120,
      note: "Bring ID",
      imageRef: "artist-ref-1",
    });
  });

  it("defaults optional fields and drops an unparseable deadline", () => {
    const event = normalizeEventDoc("evt-2", {
      title: "Open Mic",
      date: "2026-06-15T18:00:00.000Z",
      registration_deadline: "soon",
      genres: null,
      venue: "   ",
    });

    expect(event.registrationDeadline).toBeNull();
    expect(event.genres).toEqual([]);
    expect(event.location).toBeNull();
    expect(event.description).toBeNull();
    expect(event.capacity).toBeNull();
  });

  it("rejects documents without a title or a usable date", () => {
    expect(() => normalizeEventDoc("evt-3", { date: "2026-06-15T18:00:00.000Z" })).toThrow(EventDocumentError);
    expect(() => normalizeEventDoc("evt-4", { title: "No date" })).toThrow("Event evt-4: date is missing or invalid");
  });
});
