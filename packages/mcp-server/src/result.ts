import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'

export type ContentItem =
  | { type: 'text'; text: string }
  | { type: 'image'; data: string; mimeType: string }

/**
 * What a tool implementation hands back. A successful outcome always has at
 * least one content item; a domain failure carries only its message.
 */
export type ToolOutcome =
  | { ok: true; content: [ContentItem, ...ContentItem[]] }
  | { ok: false; message: string }

export function textContent(text: string): ContentItem {
  return { type: 'text', text }
}

export function imageContent(data: string, mimeType: string): ContentItem {
  return { type: 'image', data, mimeType }
}

export function toolSuccess(first: ContentItem, ...rest: ContentItem[]): ToolOutcome {
  return { ok: true, content: [first, ...rest] }
}

export function toolError(message: string): ToolOutcome {
  return { ok: false, message }
}

export function encodeToolResult(outcome: ToolOutcome): CallToolResult {
  if (!outcome.ok) {
    return {
      content: [{ type: 'text', text: outcome.message }],
      isError: true,
    }
  }
  return {
    content: outcome.content.map((item) => ({ ...item })),
  }
}
