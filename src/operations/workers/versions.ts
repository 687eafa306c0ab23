/**
 * Kernel version listing and shortlog workers.
 *
 * Both pages are cgit HTML; rows are picked apart with regular expressions
 * the same way page text is extracted elsewhere, no DOM needed.
 */

import type { HttpTransport } from "../../transport/http.js";
import { errorMessage } from "../../utils/errors.js";
import type { Channel } from "../channel.js";
import type { CommitInfo, FetchMessage, VersionInfo } from "../messages.js";

const VERSION_TAG = /^v\d+\.\d+(\.\d+)?$/;
const ROW = /<tr[^>]*>([\s\S]*?)<\/tr>/gi;
const CELL = /<td[^>]*>([\s\S]*?)<\/td>/gi;
const LINK = /<a\s[^>]*?href=(['"])(.*?)\1[^>]*>([\s\S]*?)<\/a>/i;
const TABLE_LIST = /<table[^>]*class=(['"])[^'"]*\blist\b[^'"]*\1[^>]*>([\s\S]*?)<\/table>/i;

function decodeEntities(text: string): string {
  return text
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, " ")
    .replace(/&amp;/g, "&");
}

function stripTags(html: string): string {
  return decodeEntities(html.replace(/<[^>]+>/g, "")).trim();
}

function cells(rowHtml: string): string[] {
  return [...rowHtml.matchAll(CELL)].map((match) => match[1]);
}

function parseVersionParts(version: string): number[] {
  return version
    .replace(/^v/, "")
    .split(".")
    .map((part) => Number.parseInt(part, 10))
    .filter((part) => !Number.isNaN(part));
}

/**
 * Numeric comparison of dotted versions; "v6.13" < "v6.13.1" < "v6.14"
 */
export function compareVersions(a: string, b: string): number {
  const va = parseVersionParts(a);
  const vb = parseVersionParts(b);
  for (let i = 0; i < Math.max(va.length, vb.length); i++) {
    if (i >= va.length) return -1;
    if (i >= vb.length) return 1;
    if (va[i] !== vb[i]) return va[i] - vb[i];
  }
  return 0;
}

/**
 * Major.minor series of a version: "v6.13.1" -> "6.13"
 */
export function seriesOf(version: string): string | null {
  const parts = version.replace(/^v/, "").split(".");
  if (parts.length < 2) return null;
  return `${parts[0]}.${parts[1]}`;
}

/**
 * The version before `version` in the same series, or the series base tag.
 * `all` is ordered newest first.
 */
export function previousVersion(version: string, all: readonly VersionInfo[]): string | null {
  const idx = all.findIndex((v) => v.version === version);
  const series = seriesOf(version);
  if (idx === -1 || series === null) return null;

  for (const candidate of all.slice(idx + 1)) {
    if (seriesOf(candidate.version) === series) {
      return candidate.version;
    }
  }

  const base = `v${series}`;
  if (base !== version && all.some((v) => v.version === base)) {
    return base;
  }
  return null;
}

/**
 * Source tarball URL: "6.19.2" -> <base>/v6.x/linux-6.19.2.tar.xz
 */
export function tarballUrl(version: string, baseUrl: string): string {
  const bare = version.replace(/^v/, "");
  const major = bare.split(".")[0] || "6";
  return `${baseUrl.replace(/\/+$/, "")}/v${major}.x/linux-${bare}.tar.xz`;
}

/**
 * Version tags from the tag listing page, newest first, without duplicates
 */
export function parseTagList(html: string): VersionInfo[] {
  const versions: VersionInfo[] = [];

  for (const row of html.matchAll(ROW)) {
    const rowHtml = row[1];
    const link = rowHtml.match(LINK);
    if (!link) continue;

    const text = stripTags(link[3]);
    if (!VERSION_TAG.test(text)) continue;

    const dateCell: string | undefined = cells(rowHtml)[2];
    const date = dateCell === undefined ? null : stripTags(dateCell) || null;
    versions.push({ version: text, date });
  }

  versions.sort((a, b) => compareVersions(b.version, a.version));
  return versions.filter((v, i) => i === 0 || versions[i - 1].version !== v.version);
}

/**
 * Commit rows of a log page's list table
 */
export function parseShortlog(html: string): CommitInfo[] {
  const table = html.match(TABLE_LIST);
  if (!table) return [];

  const commits: CommitInfo[] = [];
  for (const row of table[2].matchAll(ROW)) {
    const rowCells = cells(row[1]);
    if (rowCells.length < 3) continue;

    const link = rowCells[1].match(LINK);
    if (!link) continue;

    const subject = stripTags(link[3]);
    if (!subject) continue;

    const href = decodeEntities(link[2]);
    const idIdx = href.indexOf("id=");
    const hash = idIdx === -1 ? "" : href.slice(idIdx + 3).split("&")[0].slice(0, 12);

    commits.push({ hash, subject, author: stripTags(rowCells[2]) });
  }
  return commits;
}

export function shortlogUrl(logUrl: string, from: string, to: string): string {
  const url = new URL(logUrl);
  url.searchParams.set("id", to);
  url.searchParams.set("id2", from);
  return url.toString();
}

export async function runFetchVersions(
  http: HttpTransport,
  tagsUrl: string,
  channel: Channel<FetchMessage<VersionInfo>>
): Promise<void> {
  try {
    const html = await http.getText(tagsUrl);
    channel.send({ type: "done", items: parseTagList(html) });
  } catch (error) {
    channel.send({ type: "error", reason: errorMessage(error) });
  }
}

export async function runFetchShortlog(
  http: HttpTransport,
  url: string,
  channel: Channel<FetchMessage<CommitInfo>>
): Promise<void> {
  try {
    const html = await http.getText(url);
    channel.send({ type: "done", items: parseShortlog(html) });
  } catch (error) {
    channel.send({ type: "error", reason: errorMessage(error) });
  }
}
