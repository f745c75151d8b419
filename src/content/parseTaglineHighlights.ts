/**
 * Parsing of the combined tagline + highlights response.
 *
 * The prompt asks for a "Tagline:" line followed by a dash-bulleted
 * "Highlights:" list, but nothing enforces that shape, so every rule here has a
 * fallback.
 */

export interface TaglineAndHighlights {
  tagline: string;
  highlights: string[];
}

const TAGLINE_MARKER = /^tagline(?::|\s+-)\s*/i;
const HIGHLIGHTS_HEADER = /^highlights?\s*:?\s*$/i;
const NUMBERING_PREFIX = /^\d+[.)]\s*/;
const BULLET_PREFIX = /^[-*•]\s*/;

/**
 * Drop markdown bold and "1." style numbering so markers can be recognised.
 */
function normalizeMarkerLine(line: string): string {
  return line.replace(/\*\*/g, '').replace(NUMBERING_PREFIX, '').trim();
}

function stripQuotes(text: string): string {
  return text.replace(/^["'“”]+|["'“”]+$/g, '').trim();
}

function isBullet(line: string): boolean {
  return line.startsWith('-');
}

function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function parseStructured(text: string): TaglineAndHighlights {
  const lines = splitLines(text);
  const consumed = new Set<number>();
  let tagline = '';

  // Explicit "Tagline:" / "Tagline -" marker
  const markerIndex = lines.findIndex((line) => TAGLINE_MARKER.test(normalizeMarkerLine(line)));
  if (markerIndex !== -1) {
    consumed.add(markerIndex);
    const normalized = normalizeMarkerLine(lines[markerIndex]);
    tagline = stripQuotes(normalized.replace(TAGLINE_MARKER, ''));

    // "Tagline:" alone on its line, text on the next one
    const next = lines[markerIndex + 1];
    if (!tagline && next !== undefined && !isBullet(next) && !HIGHLIGHTS_HEADER.test(normalizeMarkerLine(next))) {
      tagline = stripQuotes(next.replace(/\*\*/g, ''));
      consumed.add(markerIndex + 1);
    }
  }

  // No marker: first line that is neither a bullet nor a header
  if (markerIndex === -1) {
    const firstIndex = lines.findIndex(
      (line) => !isBullet(line) && !HIGHLIGHTS_HEADER.test(normalizeMarkerLine(line))
    );
    if (firstIndex !== -1) {
      tagline = stripQuotes(lines[firstIndex].replace(/\*\*/g, ''));
      consumed.add(firstIndex);
    }
  }

  let highlights: string[] = [];
  for (const line of lines) {
    if (isBullet(line) && line.length > 1) {
      const highlight = line.slice(1).trim();
      if (highlight && !highlight.toLowerCase().startsWith('tagline')) {
        highlights.push(highlight);
      }
    }
  }

  // Unbulleted output: fold whatever else was said into one highlight
  if (highlights.length === 0 && tagline) {
    const rest = lines.filter((line, index) => {
      const normalized = normalizeMarkerLine(line);
      return (
        !consumed.has(index) &&
        !normalized.toLowerCase().startsWith('tagline') &&
        !HIGHLIGHTS_HEADER.test(normalized)
      );
    });
    if (rest.length > 0) {
      highlights = [rest.join(' ').trim()];
    }
  }

  return {
    tagline: tagline.trim(),
    highlights: highlights.filter((h) => h.trim().length > 0),
  };
}

/**
 * Fallback for replies with no plain tagline line, such as a bare bullet list:
 * the first remaining line becomes the tagline and the rest become highlights.
 */
export function salvageTaglineAndHighlights(text: string): TaglineAndHighlights {
  const lines = splitLines(text)
    .map((line) => normalizeMarkerLine(line).replace(BULLET_PREFIX, '').replace(TAGLINE_MARKER, '').trim())
    .filter((line) => line.length > 0 && !HIGHLIGHTS_HEADER.test(line));
  return {
    tagline: lines.length > 0 ? stripQuotes(lines[0]) : '',
    highlights: lines.slice(1),
  };
}

/**
 * Parse a tagline + highlights response. Never throws.
 */
export function parseTaglineAndHighlights(text: string): TaglineAndHighlights {
  if (!text.trim()) {
    return { tagline: '', highlights: [] };
  }
  const structured = parseStructured(text);
  return structured.tagline ? structured : salvageTaglineAndHighlights(text);
}
