/**
 * SVG Security Utilities
 *
 * Escaping and sanitization for SVG generation. Labels, edge labels, titles
 * and style overrides all come from user-supplied text.
 */

/**
 * Escape XML special characters for text content
 */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Escape a value for use in an SVG attribute.
 * Strips event-handler and script URL fragments after escaping.
 */
export function escapeAttribute(str: string): string {
  return escapeXml(str)
    .replace(/on\w+\s*=/gi, "")
    .replace(/javascript:/gi, "")
    .replace(/vbscript:/gi, "");
}

/**
 * Sanitize numeric values
 */
export function sanitizeNumber(value: unknown, fallback: number = 0): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const parsed = parseFloat(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return fallback;
}

/**
 * Format a coordinate with two decimals
 */
export function formatCoordinate(value: number): string {
  return sanitizeNumber(value).toFixed(2);
}

const SAFE_COLOR_NAMES = new Set([
  "black", "white", "red", "green", "blue", "yellow", "orange", "purple",
  "pink", "gray", "grey", "cyan", "magenta", "transparent", "currentcolor",
]);

/**
 * Sanitize a color value; only hex, rgb(a), hsl(a) and a short list of names
 * pass through
 */
export function sanitizeColor(color: string | undefined, fallback: string = "#000000"): string {
  if (!color) return fallback;

  if (/^#[0-9a-fA-F]{3,8}$/.test(color)) {
    return color;
  }
  if (/^rgba?\(\s*\d+\s*,\s*\d+\s*,\s*\d+\s*(,\s*[\d.]+\s*)?\)$/i.test(color)) {
    return color;
  }
  if (/^hsla?\(\s*\d+\s*,\s*\d+%?\s*,\s*\d+%?\s*(,\s*[\d.]+\s*)?\)$/i.test(color)) {
    return color;
  }

  const lowerColor = color.toLowerCase();
  if (SAFE_COLOR_NAMES.has(lowerColor)) {
    return lowerColor;
  }

  return fallback;
}

/**
 * Response headers for serving generated SVG
 */
export function getSvgSecurityHeaders(): Record<string, string> {
  return {
    "X-Content-Type-Options": "nosniff",
    "Content-Security-Policy": "default-src 'none'; style-src 'unsafe-inline'; img-src 'self' data:; frame-ancestors 'none'",
    "X-Frame-Options": "DENY",
    "Content-Type": "image/svg+xml",
  };
}

export interface SvgElementOptions {
  /** Escaped and placed as text content */
  text?: string;
  /** Already-serialized child elements */
  children?: readonly string[];
}

/**
 * Serialize an element. Attribute names are reduced to safe characters and
 * values escaped; undefined attributes are skipped. Without text or children
 * the element self-closes.
 */
export function svgElement(
  tag: string,
  attributes: Record<string, string | number | undefined>,
  options: SvgElementOptions = {}
): string {
  const attrs = Object.entries(attributes)
    .flatMap(([key, value]) => {
      if (value === undefined) return [];
      const safeKey = key.replace(/[^a-zA-Z0-9-:]/g, "");
      const safeValue = typeof value === "number"
        ? String(sanitizeNumber(value))
        : escapeAttribute(value);
      return [`${safeKey}="${safeValue}"`];
    })
    .join(" ");
  const open = attrs ? `<${tag} ${attrs}` : `<${tag}`;

  const { text, children } = options;
  if (text === undefined && (!children || children.length === 0)) {
    return `${open}/>`;
  }
  const inner = (text === undefined ? "" : escapeXml(text)) + (children ?? []).join("");
  return `${open}>${inner}</${tag}>`;
}
