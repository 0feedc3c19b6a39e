export { MarkdownGenerator, type MarkdownOptions } from './markdown.js';
