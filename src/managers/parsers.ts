import type { PackageName } from "../types/manager.js";

/**
 * Extracts a package name from one line of list output, or returns null
 * for headers, blank lines and anything else that doesn't match.
 */
export type LineRule = (line: string, index: number) => PackageName | null;

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function tokens(line: string): string[] {
  return line.trim().split(/\s+/).filter(Boolean);
}

/** `curl/jammy-updates,now 7.81.0 amd64 [installed]` → `curl` */
export const aptRule: LineRule = (line) => {
  if (!line.includes("/")) return null;
  return nonEmpty(line.split("/")[0]);
};

/** `bash.x86_64   5.2.15-3.fc38   @anaconda` → `bash` */
export const dnfRule: LineRule = (line) => {
  // Over-long names wrap; the indented continuation holds version and repo only.
  if (/^\s/.test(line)) return null;
  const first = tokens(line)[0];
  if (!first) return null;
  const dot = first.lastIndexOf(".");
  if (dot <= 0) return null;
  return first.slice(0, dot);
};

/** `app-editors/vim` is already the package atom. */
export const portageRule: LineRule = (line) => nonEmpty(line);

/** `vim 9.1.0-1` → `vim` */
export const pacmanRule: LineRule = (line) => tokens(line)[0] ?? null;

/**
 * Tab-separated `Name  Application ID  Version  Branch  Installation`.
 * The application ID is what `flatpak info`/`install` accept; single-column
 * output is taken as-is.
 */
export const flatpakRule: LineRule = (line) => {
  const fields = line.split("\t");
  return nonEmpty(fields[1]) ?? nonEmpty(fields[0]);
};

/** First line is the `Name Version Rev ...` header. */
export const snapRule: LineRule = (line, index) => {
  if (index === 0) return null;
  return tokens(line)[0] ?? null;
};

/** `ii  xz-5.4.5_1  XZ compression utilities` → `xz` */
export const xbpsRule: LineRule = (line) => {
  const pkgver = tokens(line)[1];
  if (!pkgver) return null;
  const hyphen = pkgver.lastIndexOf("-");
  if (hyphen <= 0) return null;
  return pkgver.slice(0, hyphen);
};

/** Apply a rule to every line of output, keeping only the names it yields. */
export function parseListing(stdout: string, rule: LineRule): PackageName[] {
  const names: PackageName[] = [];
  stdout.split("\n").forEach((rawLine, index) => {
    const line = rawLine.replace(/\r$/, "");
    if (!line.trim()) return;
    const name = rule(line, index);
    if (name) names.push(name);
  });
  return names;
}
