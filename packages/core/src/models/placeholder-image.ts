// packages/core/src/models/placeholder-image.ts -- Local stand-in image for when the image API is unavailable

import { Resvg } from '@resvg/resvg-js';
import type { ImagePayload, ImageRequest } from '../types/image.js';

const SIZE = 512;
const MAX_CAPTION = 48;

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function placeholderSvg(request: ImageRequest): string {
  const caption =
    request.description.length > MAX_CAPTION
      ? `${request.description.slice(0, MAX_CAPTION - 1)}…`
      : request.description;
  const tomato = request.includeMotif
    ? `<circle cx="256" cy="220" r="90" fill="#d7263d"/>
  <path d="M226 138 L256 120 L286 138 L256 150 Z" fill="#2e7d32"/>`
    : `<circle cx="256" cy="220" r="90" fill="none" stroke="#8d6e63" stroke-width="8"/>`;
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${SIZE}" height="${SIZE}" viewBox="0 0 ${SIZE} ${SIZE}">
  <rect width="${SIZE}" height="${SIZE}" fill="#fff4e6"/>
  ${tomato}
  <text x="256" y="380" font-family="sans-serif" font-size="22" text-anchor="middle" fill="#5d4037">${escapeXml(caption)}</text>
  <text x="256" y="420" font-family="sans-serif" font-size="16" text-anchor="middle" fill="#8d6e63">demo preview · ${escapeXml(request.style.replace(/_/g, ' '))}</text>
</svg>`;
}

/** Rasterize the placeholder to PNG. */
export function renderPlaceholderImage(request: ImageRequest): ImagePayload {
  const resvg = new Resvg(placeholderSvg(request), {
    fitTo: { mode: 'width', value: SIZE },
  });
  const png = resvg.render().asPng();
  return { base64: png.toString('base64'), mimeType: 'image/png' };
}
