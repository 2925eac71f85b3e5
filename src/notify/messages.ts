import type { ArchiveRequest } from "../core/archive.js";
import type { RecordId } from "../core/ids.js";

export interface RenderedMessage {
  subject: string;
  body: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function recordLink(publicBaseUrl: string | null, recordId: RecordId): string | null {
  if (!publicBaseUrl) return null;
  return `${publicBaseUrl.replace(/\/+$/, "")}/archives/${recordId}`;
}

export function renderArchiveReadyMessage(
  request: ArchiveRequest,
  recordId: RecordId,
  publicBaseUrl: string | null = null
): RenderedMessage {
  const title = request.title.trim();
  const link = recordLink(publicBaseUrl, recordId);
  const lines = [
    `<p>Your archive of <a href="${escapeHtml(request.url)}">${escapeHtml(request.url)}</a> is ready.</p>`,
    `<p>Title: ${escapeHtml(title)}<br>Record: ${recordId}</p>`
  ];
  if (link) lines.push(`<p><a href="${escapeHtml(link)}">View the archived record</a></p>`);
  return { subject: `Archive ready: ${title}`, body: lines.join("\n") };
}
