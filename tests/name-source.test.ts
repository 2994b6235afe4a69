/**
 * Tests for name lookup — HTML table parsing and the name sources
 */
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  HttpNameSource,
  StaticNameSource,
  namesFromRows,
  parseArmorPage,
  parseHtmlTables,
  parseModelNumber,
  parseWeaponPage,
} from "../src/name-source.js";

const WEAPON_PAGE = `
<html><body>
<table>
  <thead><tr><th>File</th><th>Type</th><th>Names</th></tr></thead>
  <tbody>
    <tr><td>we010.pac</td><td>GS</td><td>Bone Blade<br>Bone Blade+</td></tr>
    <tr><td>we011.pac</td><td>GS</td><td>UNUSED</td></tr>
    <tr><td>we012.pac</td><td>GS</td><td>Old Blade<br>(unused) Old Blade+</td></tr>
    <tr><td>readme.txt</td><td>-</td><td>Not a model</td></tr>
    <tr><td>we013.pac</td><td>GS</td></tr>
  </tbody>
</table>
<table><tbody><tr><td>we099.pac</td><td></td><td>No header</td></tr></tbody></table>
</body></html>`;

const armorPage = (female: string, male: string) => `
<table><thead><tr><th>F</th><th>-</th><th>Names</th></tr></thead><tbody>${female}</tbody></table>
<table><thead><tr><th>M</th><th>-</th><th>Names</th></tr></thead><tbody>${male}</tbody></table>`;

const HEAD_PAGE = armorPage(
  "<tr><td>f_hair005.pac</td><td></td><td>Ribbon</td></tr>",
  "<tr><td>m_hair010.pac</td><td></td><td>Leather S<br>Leather S+</td></tr><tr><td>m_hair012.pac</td><td></td><td>Leather G</td></tr>",
);

describe("parseModelNumber", () => {
  it.each([
    ["we021.pac", 21],
    ["m_hair096.pac", 96],
    ["  f_body7.pac ", 7],
  ])("reads '%s' as %i", (file, model) => {
    expect(parseModelNumber(file)).toBe(model);
  });

  it.each(["readme.txt", "we.pac", "we010.pac.bak"])("rejects '%s'", (file) => {
    expect(parseModelNumber(file)).toBeNull();
  });
});

describe("parseHtmlTables", () => {
  it("reads only tables with a header, turning <br> into separators", () => {
    const tables = parseHtmlTables(WEAPON_PAGE);
    expect(tables).toHaveLength(1);
    expect(tables[0][0]).toEqual(["we010.pac", "GS", "Bone Blade|Bone Blade+"]);
    expect(tables[0]).toHaveLength(5);
  });
});

describe("namesFromRows", () => {
  it("drops short rows, non-model files and names marked unused", () => {
    const rows = [
      ["we001.pac", "", "A|unused B|C"],
      ["we002.pac", ""],
      ["we003.pac", "", "UNUSED"],
      ["notes", "", "D"],
    ];
    expect(namesFromRows(rows)).toEqual(new Map([[1, ["A", "C"]]]));
  });
});

describe("parseWeaponPage", () => {
  it("maps model numbers to names", () => {
    expect(parseWeaponPage(WEAPON_PAGE)).toEqual(new Map([
      [10, ["Bone Blade", "Bone Blade+"]],
      [12, ["Old Blade"]],
    ]));
  });

  it("fails on a page without tables", () => {
    expect(() => parseWeaponPage("<p>moved</p>")).toThrow("No tables found on weapons page");
  });
});

describe("parseArmorPage", () => {
  it("reads the female table first and the male table second", () => {
    const { male, female } = parseArmorPage(HEAD_PAGE, "head");
    expect(female).toEqual(new Map([[5, ["Ribbon"]]]));
    expect(male).toEqual(new Map([[10, ["Leather S", "Leather S+"]], [12, ["Leather G"]]]));
  });

  it("fails when a table is missing", () => {
    expect(() => parseArmorPage(WEAPON_PAGE, "chest")).toThrow("Expected 2 tables for chest, found 1");
  });
});

describe("StaticNameSource", () => {
  it("serves empty tables by default", async () => {
    const source = new StaticNameSource();
    expect((await source.weaponNames()).size).toBe(0);
    const head = await source.armorNames("head");
    expect(head.male.size + head.female.size).toBe(0);
  });

  it("serves the tables it was given", async () => {
    const female = new Map([[5, ["Ribbon"]]]);
    const source = new StaticNameSource(new Map(), { head: { male: new Map(), female } });
    expect((await source.armorNames("head")).female).toBe(female);
  });
});

describe("HttpNameSource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("fetches the weapon page under the base URL", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(WEAPON_PAGE, { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const names = await new HttpNameSource("https://docs.example.test/player/", 1000).weaponNames();

    expect(names.get(10)).toEqual(["Bone Blade", "Bone Blade+"]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]).toEqual([
      "https://docs.example.test/player/pl_weapons.html",
      expect.objectContaining({ headers: expect.objectContaining({ Accept: "text/html" }) }),
    ]);
  });

  it("fetches the slot page for armor", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(HEAD_PAGE, { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const tables = await new HttpNameSource("https://docs.example.test/player", 1000).armorNames("chest");

    expect(tables.male.get(12)).toEqual(["Leather G"]);
    expect(fetchMock.mock.calls[0][0]).toBe("https://docs.example.test/player/pl_body.html");
  });

  it("rejects on an HTTP error status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("gone", { status: 404 })));

    await expect(new HttpNameSource("https://docs.example.test/player", 1000).weaponNames())
      .rejects.toThrow("Name page https://docs.example.test/player/pl_weapons.html returned HTTP 404");
  });
});
