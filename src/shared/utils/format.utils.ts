/**
 * =============================================================================
 * DISPLAY FORMATTING
 * =============================================================================
 */

/**
 * 1530 → "1.5 km"
 */
export function formatDistanceKm(meters: number): string {
  return `${(meters / 1000).toFixed(1)} km`;
}

/**
 * 95 → "1.6 min"
 */
export function formatDurationMinutes(seconds: number): string {
  return `${(seconds / 60).toFixed(1)} min`;
}

/**
 * Escape text for interpolation into HTML (element content and quoted attributes)
 */
export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * JSON for an inline <script type="application/json"> block
 */
export function serializeForScript(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/&/g, '\\u0026');
}
