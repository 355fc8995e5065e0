// src/services/extractDate/eventDetails.ts
// Hosts and free-text description: whatever the resolved fields did not use.
import type { EventDetails, NormalizedLine, Resolution } from "../../types/events";

const HOST_PATTERNS: readonly RegExp[] = [
  /\b(?:hosted|presented)\s+by:?\s+(.+)$/i,
  /\b(?:featuring|feat\.|ft\.)\s+(.+)$/i,
  /\b(DJs?\s+.+)$/,
];

export function hostOf(text: string): string | null {
  for (const pattern of HOST_PATTERNS) {
    const m = text.match(pattern);
    if (!m) continue;
    const host = m[1].replace(/[\s.,;:!|-]+$/, "").trim();
    if (host) return host;
  }
  return null;
}

function usedLines(resolution: Resolution): Set<number> {
  const used = new Set<number>();
  const { title, date, time, location } = resolution;
  if (title) {
    for (let i = 0; i < title.candidate.lineCount; i++) used.add(title.candidate.lineIndex + i);
  }
  for (const field of [date, time, location]) {
    if (field) used.add(field.candidate.lineIndex);
  }
  return used;
}

export function extractDetails(lines: readonly NormalizedLine[], resolution: Resolution): EventDetails {
  const used = usedLines(resolution);
  const hosts: string[] = [];
  const description: string[] = [];

  for (const line of lines) {
    const host = hostOf(line.text);
    if (host) {
      if (!hosts.includes(host)) hosts.push(host);
      continue;
    }
    if (used.has(line.index)) continue;
    if (line.text.split(" ").length > 3) description.push(line.text);
  }

  return description.length > 0 ? { hosts, description: description.join(" ") } : { hosts };
}
