import { SummarizeError } from '../errors.js';
import type { Summary, SummarySection } from '../../types/index.js';

const HEADING = /^#{1,6}\s+(.*?)[\s#]*$/;
const BULLET = /^(?:[-*+•]|\d+[.)])\s+(.*)$/;

function malformed(message: string, response: string): SummarizeError {
  const excerpt = response.length > 200 ? `${response.slice(0, 200)}…` : response;
  return new SummarizeError('MalformedSummaryResponse', `${message}. Response: ${excerpt}`);
}

/**
 * Pulls the markdown summary out of a model response. The model is asked for
 * `{"scratchpad": ..., "summary": ...}`; a bare markdown answer is accepted as is.
 */
export function extractSummaryMarkdown(response: string): string {
  let cleanText = response.trim();
  if (cleanText.startsWith('```json')) {
    cleanText = cleanText.slice(7);
  } else if (cleanText.startsWith('```')) {
    cleanText = cleanText.slice(3);
  }
  if (cleanText.endsWith('```')) {
    cleanText = cleanText.slice(0, -3);
  }
  cleanText = cleanText.trim();

  if (cleanText.startsWith('<!DOCTYPE') || cleanText.startsWith('<html')) {
    throw malformed('Received HTML instead of JSON', cleanText);
  }

  if (cleanText.startsWith('#')) {
    return cleanText;
  }

  const parsed = parseJson(cleanText);

  const value = typeof parsed === 'object' && parsed !== null && 'summary' in parsed ? parsed.summary : undefined;
  if (typeof value !== 'string') {
    throw malformed('Model response has no "summary" string', cleanText);
  }

  const summary = value.trim();
  if (!summary) {
    throw malformed('Model response has an empty summary', cleanText);
  }
  return summary;
}

/** Parses the response as is, and only repairs stray quotes when that fails. */
function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return parseRepairedJson(text);
  }
}

function parseRepairedJson(text: string): unknown {
  try {
    return JSON.parse(fixUnescapedQuotes(text));
  } catch {
    throw malformed('Failed to parse model response as JSON', text);
  }
}

/**
 * Reads `# Title`, `## Section` and bullet lines into a Summary. Lines under the
 * title before any section go into a section named after the title; sections with
 * the same heading are merged.
 */
export function parseSummaryMarkdown(videoId: string, markdown: string): Summary {
  let title: string | null = null;
  const sections: SummarySection[] = [];
  let current: SummarySection | null = null;

  for (const rawLine of markdown.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const heading = HEADING.exec(line);
    if (heading) {
      const text = heading[1].replace(/\*\*/g, '').trim();
      if (!text) continue;

      if (title === null) {
        title = text;
      } else {
        current = { heading: text, bullets: [] };
        sections.push(current);
      }
      continue;
    }

    if (title === null) {
      throw malformed('Summary does not start with a title heading', markdown);
    }

    const bullet = BULLET.exec(line);
    const text = (bullet ? bullet[1] : line).trim();
    if (!text) continue;

    if (!current) {
      current = { heading: title, bullets: [] };
      sections.push(current);
    }
    current.bullets.push(text);
  }

  if (title === null) {
    throw malformed('Summary has no title heading', markdown);
  }

  const merged = mergeSections(sections);
  if (merged.length === 0) {
    throw malformed('Summary has no bullet points', markdown);
  }

  return { videoId, title, sections: merged };
}

export function parseSummaryResponse(videoId: string, response: string): Summary {
  return parseSummaryMarkdown(videoId, extractSummaryMarkdown(response));
}

function mergeSections(sections: SummarySection[]): SummarySection[] {
  const merged: SummarySection[] = [];
  const byHeading = new Map<string, SummarySection>();

  for (const section of sections) {
    if (section.bullets.length === 0) continue;

    const key = section.heading.toLowerCase();
    let target = byHeading.get(key);
    if (!target) {
      target = { heading: section.heading, bullets: [] };
      byHeading.set(key, target);
      merged.push(target);
    }

    for (const bullet of section.bullets) {
      if (!target.bullets.includes(bullet)) {
        target.bullets.push(bullet);
      }
    }
  }

  return merged;
}

/**
 * Fix unescaped quotes inside JSON string values.
 * Example: {"key": "value with "unescaped" quotes"} -> {"key": "value with \"unescaped\" quotes"}
 */
export function fixUnescapedQuotes(json: string): string {
  const result: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = 0; i < json.length; i++) {
    const char = json[i];

    if (escaped) {
      escaped = false;
      result.push(char);
      continue;
    }

    if (char === '\\' && inString) {
      escaped = true;
      result.push(char);
      continue;
    }

    if (char !== '"') {
      result.push(char);
      continue;
    }

    if (!inString) {
      inString = true;
      result.push(char);
      continue;
    }

    // A closing quote is followed by structure; anything else is a stray quote
    const afterQuote = json.slice(i + 1).trimStart();
    const isEndOfString =
      afterQuote.startsWith(',') ||
      afterQuote.startsWith('}') ||
      afterQuote.startsWith(']') ||
      afterQuote.startsWith(':') ||
      afterQuote.length === 0;

    if (isEndOfString) {
      inString = false;
      result.push(char);
    } else {
      result.push('\\"');
    }
  }

  return result.join('');
}
