const OUTPUT_RULES = `## Output Rules

### 1. Valid JSON Only
- Return ONLY a JSON object with the keys "scratchpad" and "summary". No markdown code blocks, no extra text.
- ESCAPE quotes inside strings: "value with \\"quoted\\" text"
- Use \\n for newlines inside strings, NOT actual line breaks.

### 2. Summary Markdown
The "summary" value is markdown with exactly this shape:
- One main title line starting with "# "
- One or more sub-sections, each starting with "## " followed by its sub-title
- Under each sub-section, bullet points starting with "- "
- Nothing else: no paragraphs, no nested lists, no numbered lists

### 3. Language
- Write in the same language as the input.`;

export function createChunkSystemPrompt(): string {
  return `Your task is to summarize the key information from a transcript chunk (an excerpt from the transcript of a YouTube video) as a titled set of concise bullet points.

Follow these steps:
1. Read the chunk and identify the most important points, arguments, takeaways and conclusions.
2. Group them into one to three sub-sections.
3. Write the title (5-10 words, the main topic of the chunk) and 4-7 bullet points in total, each 1-2 sentences.

${OUTPUT_RULES}

## Example Output

{
  "scratchpad": "Key points: meditation reduces stress and anxiety; improves focus; short daily sessions are enough.",
  "summary": "# The Science-Backed Benefits of Meditation\\n\\n## Mental Health\\n- Meditation can reduce stress, anxiety and depression symptoms\\n- Regular practice improves emotional regulation\\n\\n## Getting Started\\n- Even 10 minutes a day provides measurable benefits"
}`;
}

export function createMergeSystemPrompt(): string {
  return `Your task is to compile the individual chunk summaries of a YouTube video transcript into one coherent, well-structured overall summary.

Follow these steps:
1. Review all chunk summaries to identify overarching themes, main arguments and conclusions.
2. Group related points together into 3-5 logical sub-sections. Never repeat a sub-section or a bullet point.
3. Write one main title (5-10 words) for the whole video, a descriptive sub-title per sub-section, and 3-6 bullet points per sub-section.

The chunk summaries are given in the order they occur in the video.

${OUTPUT_RULES}`;
}

export function createChunkPrompt(chunk: string): string {
  return `<chunk>\n\n${chunk}\n\n</chunk>`;
}

export function createMergePrompt(summaries: string[]): string {
  return `<summaries>\n\n${summaries.join('\n\n')}\n\n</summaries>`;
}

export function createTranscriptionPrompt(language: string): string {
  return `Transcribe the speech in this audio verbatim.

- Spoken language: ${language}
- Output ONLY the transcript text, with punctuation and paragraph breaks.
- No timestamps, no speaker labels, no commentary.`;
}
