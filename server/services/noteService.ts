/**
 * Reference notes (Xiaohongshu share links) for the itinerary prompt.
 *
 * Note ids come from `xhslink.com/<id>` short links or
 * `xiaohongshu.com/explore/<id>` pages. Content is fetched from the
 * configured note API; without one there is no content to offer.
 */

import { z } from "zod";
import type { NoteContentClient, ReferenceNote } from "./itinerary";

const NOTE_TIMEOUT_MS = 10_000;

export function extractNoteId(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return null;
  }

  const host = parsed.hostname.toLowerCase();
  const segments = parsed.pathname.split("/").filter(Boolean);

  if (host === "xhslink.com" || host.endsWith(".xhslink.com")) {
    return segments.at(-1) ?? null;
  }

  if (host === "xiaohongshu.com" || host.endsWith(".xiaohongshu.com")) {
    const index = segments.indexOf("explore");
    if (index !== -1 && index + 1 < segments.length) {
      return segments[index + 1];
    }
  }

  return null;
}

const noteResponseSchema = z.object({
  title: z.string().default(""),
  content: z.string().default(""),
  tags: z.array(z.string()).default([]),
});

export class NoteService implements NoteContentClient {
  constructor(private readonly baseUrl: string | null) {}

  async getNoteContent(url: string): Promise<ReferenceNote | null> {
    const noteId = extractNoteId(url);
    if (!noteId) {
      console.warn(`[Notes] Not a recognised note link: ${url}`);
      return null;
    }
    if (!this.baseUrl) {
      return null;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), NOTE_TIMEOUT_MS);

    try {
      const endpoint = `${this.baseUrl.replace(/\/+$/, "")}/notes/${encodeURIComponent(noteId)}`;
      const response = await fetch(endpoint, { signal: controller.signal });
      if (!response.ok) {
        console.warn(`[Notes] Fetch failed for ${noteId}: ${response.status}`);
        return null;
      }

      const parsed = noteResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        console.warn(`[Notes] Unexpected payload for ${noteId}`);
        return null;
      }
      if (!parsed.data.title && !parsed.data.content) return null;

      return { noteId, ...parsed.data };
    } catch (error) {
      console.warn(`[Notes] Fetch error for ${noteId}:`, error instanceof Error ? error.message : error);
      return null;
    } finally {
      clearTimeout(timeout);
    }
  }
}
