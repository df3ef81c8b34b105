import type { InstallReport, PackageEntry } from "../types/report.js";

/** `curl (apt)` */
export function formatEntry(entry: PackageEntry): string {
  return `${entry.package} (${entry.manager})`;
}

function section(title: string, entries: readonly PackageEntry[]): string[] {
  if (entries.length === 0) return [];
  return ["", `${title}:`, ...entries.map((e) => `- ${formatEntry(e)}`)];
}

/** Plain-text installation summary. */
export function summarizeReport(report: InstallReport): string {
  const lines = [
    "--- Installation Summary ---",
    ...section("Already Installed Packages", report.alreadyInstalled),
    ...section("Successfully Installed Packages", report.newlyInstalled),
    ...section("Failed to Install Packages", report.failed),
    ...section("Would Install Packages", report.pending),
  ];
  if (report.newlyInstalled.length === 0 && report.failed.length === 0) {
    lines.push("", "No new packages were installed.");
  }
  return lines.join("\n");
}
