import escapeHtml from "escape-html";

export const FALLBACK_GLYPH = "🌐";

/**
 * Render the icon part of an organization card: an `<img>` pointing into
 * the favicon directory, or a placeholder glyph when there is no icon.
 */
export function renderFaviconCell(
  filename: string | null,
  options: { faviconPath?: string } = {},
): string {
  if (filename === null) {
    return `<span class="favicon-fallback" aria-hidden="true">${FALLBACK_GLYPH}</span>`;
  }

  const faviconPath = (options.faviconPath ?? "favicon").replace(/\/+$/, "");
  const src = faviconPath === "" ? filename : `${faviconPath}/${filename}`;

  return `<img class="favicon" src="${escapeHtml(src)}" alt="" aria-hidden="true" loading="lazy">`;
}
