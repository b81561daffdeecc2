import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';

function createStructuredTextBlock(structured: object): ContentBlock {
  return { type: 'text', text: JSON.stringify(structured) };
}

/** Mirrors the structured result as a JSON text block for clients without outputSchema support. */
export function createToolResponse<T extends object>(
  structured: T
): {
  content: ContentBlock[];
  structuredContent: T;
} {
  return {
    content: [createStructuredTextBlock(structured)],
    structuredContent: structured,
  };
}
