import type { Task } from "./task-catalog.js";

const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

// Canonical base64 only: the text must survive a decode/encode round trip.
export function isBase64(text: string): boolean {
  if (!text || text.length % 4 !== 0 || !BASE64_RE.test(text)) return false;
  return Buffer.from(text, "base64").toString("base64") === text;
}

// Catalog READMEs and templates arrive base64-encoded, but some are stored as
// plain text. Only strings that round-trip exactly and decode to clean UTF-8
// are treated as base64.
export function decodeContent(raw: string): string {
  const compact = raw.replace(/\s+/g, "");
  if (!isBase64(compact)) {
    return raw;
  }
  const decoded = Buffer.from(compact, "base64").toString("utf8");
  if (decoded.includes("\uFFFD") || /[\u0000-\u0008\u000E-\u001F]/.test(decoded)) {
    return raw;
  }
  return decoded;
}

export function encodeContent(content: string): string {
  return Buffer.from(content, "utf8").toString("base64");
}

const HEADING_RE = /^#{1,6}\s+(.*)$/;
const BULLET_RE = /^\s*(?:[-*+]|\d+\.)\s+(.*)$/;

// Bullets listed under the first heading matching `pattern`; falls back to
// the first bullets anywhere in the document.
function bulletsUnderHeading(readme: string, pattern: RegExp, limit: number): string[] {
  const lines = readme.split(/\r?\n/);
  const section: string[] = [];
  let inSection = false;
  for (const line of lines) {
    const heading = HEADING_RE.exec(line.trim());
    if (heading) {
      if (inSection) break;
      inSection = pattern.test(heading[1] ?? "");
      continue;
    }
    const bullet = BULLET_RE.exec(line);
    if (inSection && bullet?.[1]) {
      section.push(bullet[1].trim());
    }
  }
  return section.slice(0, limit);
}

export function extractCapabilities(readme: string): string[] {
  const listed = bulletsUnderHeading(readme, /capabilit|feature/i, 5);
  if (listed.length > 0) return listed;
  return readme
    .split(/\r?\n/)
    .map((line) => BULLET_RE.exec(line)?.[1]?.trim())
    .filter((line): line is string => Boolean(line))
    .slice(0, 3);
}

export function extractUseCases(readme: string): string[] {
  return bulletsUnderHeading(readme, /use case|usage|example/i, 5);
}

export function extractPurpose(description: string): string {
  const trimmed = description.trim();
  const firstSentence = trimmed.split(/(?<=[.!?])\s+/)[0] ?? "";
  return firstSentence.length > 200 ? `${firstSentence.slice(0, 197)}...` : firstSentence;
}

export function taskAppType(task: Pick<Task, "appTags">): string {
  return task.appTags.appType?.[0] ?? "generic";
}

export function categorizeTasks(tasks: Array<{ name: string; tags: string[] }>): Map<string, string[]> {
  const categories = new Map<string, string[]>();
  for (const task of tasks) {
    const tags = task.tags.length > 0 ? task.tags : ["uncategorized"];
    for (const tag of tags) {
      const names = categories.get(tag) ?? [];
      names.push(task.name);
      categories.set(tag, names);
    }
  }
  return categories;
}
