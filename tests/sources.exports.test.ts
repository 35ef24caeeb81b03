import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { access, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parseCsv, parseCsvRecords } from "../src/sources/csv.js";
import { createFandangoSource, parseFandangoHistory } from "../src/sources/fandango.js";
import { parseAppleMusicHistory } from "../src/sources/music.js";
import { createNetflixSource, parseNetflixHistory } from "../src/sources/netflix.js";
import { parseTicketmasterHistory, splitTicketmasterRow } from "../src/sources/ticketmaster.js";
import { createYelpSource, parseYelpReviews } from "../src/sources/yelp.js";

describe("csv reader", () => {
  it("handles quoting, escaped quotes and embedded commas", () => {
    expect(parseCsv('a,b\n"x, y","he said ""hi"""\n')).toEqual([
      ["a", "b"],
      ["x, y", 'he said "hi"']
    ]);
  });

  it("keeps line breaks inside quoted fields", () => {
    expect(parseCsv('a\n"line1\nline2"\n')).toEqual([["a"], ["line1\nline2"]]);
  });

  it("ignores a BOM, CRLF endings and blank lines", () => {
    expect(parseCsv("\uFEFFh1,h2\r\n1,2\r\n\r\n")).toEqual([
      ["h1", "h2"],
      ["1", "2"]
    ]);
  });

  it("keeps a quote inside an unquoted field as a literal", () => {
    expect(parseCsv('Title,Date\n12" Single: Remix,03/05/24\nShow B,03/06/24\n')).toEqual([
      ["Title", "Date"],
      ['12" Single: Remix', "03/05/24"],
      ["Show B", "03/06/24"]
    ]);
  });

  it("keys rows by trimmed header", () => {
    expect(parseCsvRecords(" Title ,Date\nShow\n")).toEqual([{ Title: "Show", Date: "" }]);
    expect(parseCsvRecords("")).toEqual([]);
  });
});

describe("netflix viewing history", () => {
  it("parses titles and drops rows without a usable date or title", () => {
    const parsed = parseNetflixHistory(
      'Title,Date\n"Show: Season 1: ""Pilot""",03/05/24\nMovie,3/6/2024\n,03/07/24\nBad,someday\n'
    );

    expect(parsed).toEqual({
      ok: true,
      records: [
        { date: "2024-03-05", kind: "streaming", payload: { title: 'Show: Season 1: "Pilot"' } },
        { date: "2024-03-06", kind: "streaming", payload: { title: "Movie" } }
      ],
      dropped: 2
    });
  });

  it("reads every row after a title with a stray quote", () => {
    const parsed = parseNetflixHistory('Title,Date\n12" Single: Remix,03/05/24\nShow B,03/06/24\nShow C,03/07/24\n');

    expect(parsed).toEqual({
      ok: true,
      records: [
        { date: "2024-03-05", kind: "streaming", payload: { title: '12" Single: Remix' } },
        { date: "2024-03-06", kind: "streaming", payload: { title: "Show B" } },
        { date: "2024-03-07", kind: "streaming", payload: { title: "Show C" } }
      ],
      dropped: 0
    });
  });

  it("rejects a file without the expected columns", () => {
    expect(parseNetflixHistory("Name,When\nx,1/1/24\n")).toEqual({
      ok: false,
      message: "expected 'Title' and 'Date' columns"
    });
  });
});

describe("apple music history", () => {
  it("files plays under the local day of the epoch timestamp", () => {
    // 2021-01-01T00:00:00Z is still New Year's Eve in the test time zone.
    const parsed = parseAppleMusicHistory("Track Name,Last Played Date\nSong A,1609459200000\nSong B,yesterday\n");

    expect(parsed).toEqual({
      ok: true,
      records: [{ date: "2020-12-31", kind: "music", payload: { trackName: "Song A" } }],
      dropped: 1
    });
  });
});

describe("fandango purchase history", () => {
  it("reads weekday and month-name dates with optional theater details", () => {
    const parsed = parseFandangoHistory(
      "Movie,Date,Theater,Address\n" +
        'Dune,"Monday, Mar 9 2020 at 2:15 PM",AMC 12,"1 Main St, Town"\n' +
        'Tenet,"September 3, 2020",,\n'
    );

    expect(parsed).toEqual({
      ok: true,
      records: [
        {
          date: "2020-03-09",
          kind: "purchase",
          payload: { movieName: "Dune", theaterName: "AMC 12", theaterAddress: "1 Main St, Town" }
        },
        { date: "2020-09-03", kind: "purchase", payload: { movieName: "Tenet" } }
      ],
      dropped: 0
    });
  });
});

describe("ticketmaster order history", () => {
  it("rejoins a date split by an unquoted comma", () => {
    expect(splitTicketmasterRow(["Feb 29", " 2020", "Arena", "Concert"])).toEqual({
      date: "Feb 29, 2020",
      location: "Arena",
      event: "Concert"
    });
  });

  it("keeps commas inside event names", () => {
    expect(splitTicketmasterRow(["2020-02-29", "Arena", "Rock", " Paper", " Scissors Tour"])).toEqual({
      date: "2020-02-29",
      location: "Arena",
      event: "Rock, Paper, Scissors Tour"
    });
  });

  it("skips the header and drops rows without an event", () => {
    const parsed = parseTicketmasterHistory(
      "date,location,event\nFeb 29, 2020,Arena,Concert\n2020-03-01,Club,\n12 March 2020,Hall,Play\n"
    );

    expect(parsed).toEqual({
      ok: true,
      records: [
        { date: "2020-02-29", kind: "event", payload: { event: "Concert", location: "Arena" } },
        { date: "2020-03-12", kind: "event", payload: { event: "Play", location: "Hall" } }
      ],
      dropped: 1
    });
  });
});

describe("yelp review export", () => {
  it("reads data rows from the first table", () => {
    const parsed = parseYelpReviews(`
      <html><body>
        <table>
          <tr><th>Date</th><th>Business</th><th>Rating</th><th>Comment</th></tr>
          <tr><td>2024-03-05</td><td>Corner Cafe</td><td>4.5</td><td>Great coffee</td></tr>
          <tr><td>March 6, 2024</td><td>Diner</td><td>n/a</td><td>Slow</td></tr>
          <tr><td>only</td><td>two</td></tr>
        </table>
      </body></html>`);

    expect(parsed).toEqual({
      ok: true,
      records: [
        {
          date: "2024-03-05",
          kind: "review",
          payload: { businessName: "Corner Cafe", rating: 4.5, comment: "Great coffee" }
        },
        { date: "2024-03-06", kind: "review", payload: { businessName: "Diner", comment: "Slow" } }
      ],
      dropped: 1
    });
  });

  it("reports a page without a table", () => {
    expect(parseYelpReviews("<p>nothing here</p>")).toEqual({ ok: false, message: "no <table> in review export" });
  });
});

describe("export sources", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "journal-exports-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("reports an unset path as not configured", async () => {
    expect(await createNetflixSource(undefined).collect()).toEqual({
      ok: false,
      reason: "not_configured",
      message: "netflix path is not configured"
    });
  });

  it("reports a missing file as not found", async () => {
    const file = path.join(dir, "ViewingActivity.csv");
    expect(await createNetflixSource(file).collect()).toEqual({
      ok: false,
      reason: "not_found",
      message: `netflix not found: ${file}`
    });
  });

  it("reports an unparseable file as malformed", async () => {
    const file = path.join(dir, "reviews.html");
    await writeFile(file, "<p>empty</p>");
    expect(await createYelpSource(file).collect()).toEqual({
      ok: false,
      reason: "malformed",
      message: "yelp: no <table> in review export"
    });
  });

  it("reports an unterminated quoted field as malformed", async () => {
    const file = path.join(dir, "ViewingActivity.csv");
    await writeFile(file, 'Title,Date\n"Show A,03/05/24\n');

    expect(await createNetflixSource(file).collect()).toEqual({
      ok: false,
      reason: "malformed",
      message: expect.stringMatching(/^netflix: .*quote/i)
    });
  });

  it("treats a missing download at the default fandango path as not configured", async () => {
    vi.spyOn(os, "homedir").mockReturnValue(dir);

    expect(await createFandangoSource(undefined).collect()).toEqual({
      ok: false,
      reason: "not_configured",
      message: `fandango has no export at ${path.join(dir, "Downloads", "FandangoPurchaseHistory.csv")}`
    });
  });

  it("reads the fandango download from the default path", async () => {
    vi.spyOn(os, "homedir").mockReturnValue(dir);
    await mkdir(path.join(dir, "Downloads"));
    await writeFile(path.join(dir, "Downloads", "FandangoPurchaseHistory.csv"), "Movie,Date\nDune,2020-03-09\n");

    expect(await createFandangoSource(undefined).collect()).toEqual({
      ok: true,
      records: [{ date: "2020-03-09", kind: "purchase", payload: { movieName: "Dune" } }],
      dropped: 0
    });
  });

  it("still reports a missing explicit fandango path as not found", async () => {
    const file = path.join(dir, "purchases.csv");
    expect(await createFandangoSource(file).collect()).toEqual({
      ok: false,
      reason: "not_found",
      message: `fandango not found: ${file}`
    });
  });

  it("offers cleanup only when removable", async () => {
    const file = path.join(dir, "ViewingActivity.csv");
    await writeFile(file, "Title,Date\nShow,03/05/24\n");

    expect(createNetflixSource(file).cleanup).toBeUndefined();

    const source = createNetflixSource(file, true);
    const outcome = await source.collect();
    expect(outcome.ok).toBe(true);
    expect(await source.cleanup?.()).toBe(true);
    await expect(access(file)).rejects.toThrow();
  });
});
