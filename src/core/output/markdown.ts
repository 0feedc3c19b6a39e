import { writeFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { Summary, VideoRef } from '../../types/index.js';

export interface MarkdownOptions {
  /** Adds YAML frontmatter with the video link and generation time. */
  frontmatter: boolean;
  generatedAt?: Date;
}

export class MarkdownGenerator {
  generate(summary: Summary, options: MarkdownOptions = { frontmatter: false }): string {
    const body = this.generateBody(summary);
    if (!options.frontmatter) {
      return body;
    }

    return `${this.generateFrontmatter(summary, options.generatedAt ?? new Date())}\n\n${body}`;
  }

  private generateFrontmatter(summary: Summary, generatedAt: Date): string {
    const video: VideoRef = {
      videoId: summary.videoId,
      url: `https://www.youtube.com/watch?v=${summary.videoId}`,
    };

    return `---
title: "${this.escapeYaml(summary.title)}"
video_id: "${video.videoId}"
url: "${video.url}"
summarized_at: "${generatedAt.toISOString()}"
---`;
  }

  private generateBody(summary: Summary): string {
    let content = `# ${summary.title}\n`;

    for (const section of summary.sections) {
      content += `\n## ${section.heading}\n\n`;
      content += section.bullets.map((bullet) => `- ${bullet}`).join('\n');
      content += '\n';
    }

    return content;
  }

  async writeToFile(content: string, outputPath: string): Promise<void> {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, content, 'utf-8');
  }

  private escapeYaml(str: string): string {
    return str.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, ' ');
  }
}
