import { eastAsianWidth } from "get-east-asian-width";

// Grapheme segmenter (shared instance)
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

// Regexes for character classification (same as string-width library)
const zeroWidthRegex = /^(?:\p{Default_Ignorable_Code_Point}|\p{Control}|\p{Mark}|\p{Surrogate})+$/u;
const leadingNonPrintingRegex = /^[\p{Default_Ignorable_Code_Point}\p{Control}\p{Format}\p{Mark}\p{Surrogate}]+/u;
const pictographicRegex = /\p{Extended_Pictographic}/u;

// Cache for non-ASCII strings
const WIDTH_CACHE_SIZE = 512;
const widthCache = new Map<string, number>();

/**
 * Calculate the terminal width of a single grapheme cluster.
 */
function graphemeWidth(segment: string): number {
	// Zero-width clusters
	if (zeroWidthRegex.test(segment)) {
		return 0;
	}

	// Emoji presentation: pictographs with VS16 or multi-codepoint sequences
	if (pictographicRegex.test(segment) && (segment.includes("\uFE0F") || segment.length > 2)) {
		return 2;
	}

	// Get base visible codepoint
	const base = segment.replace(leadingNonPrintingRegex, "");
	const cp = base.codePointAt(0);
	if (cp === undefined) {
		return 0;
	}

	return eastAsianWidth(cp);
}

/**
 * Calculate the visible width of a string in terminal columns.
 * The text is expected to be free of escape sequences.
 */
export function visibleWidth(str: string): number {
	if (str.length === 0) {
		return 0;
	}

	// Fast path: pure ASCII printable
	let isPureAscii = true;
	for (let i = 0; i < str.length; i++) {
		const code = str.charCodeAt(i);
		if (code < 0x20 || code > 0x7e) {
			isPureAscii = false;
			break;
		}
	}
	if (isPureAscii) {
		return str.length;
	}

	const cached = widthCache.get(str);
	if (cached !== undefined) {
		return cached;
	}

	let width = 0;
	for (const { segment } of segmenter.segment(str)) {
		width += graphemeWidth(segment);
	}

	if (widthCache.size >= WIDTH_CACHE_SIZE) {
		const firstKey = widthCache.keys().next().value;
		if (firstKey !== undefined) {
			widthCache.delete(firstKey);
		}
	}
	widthCache.set(str, width);

	return width;
}

/**
 * Truncate text to fit within a maximum visible width, adding ellipsis if needed.
 *
 * @param text - Plain text to truncate
 * @param maxWidth - Maximum visible width, ellipsis included
 * @param ellipsis - Ellipsis string to append when truncating (default: "...")
 */
export function truncateToWidth(text: string, maxWidth: number, ellipsis: string = "..."): string {
	if (visibleWidth(text) <= maxWidth) {
		return text;
	}

	const targetWidth = maxWidth - visibleWidth(ellipsis);
	if (targetWidth <= 0) {
		return ellipsis.substring(0, Math.max(0, maxWidth));
	}

	let result = "";
	let currentWidth = 0;
	for (const { segment } of segmenter.segment(text)) {
		const width = graphemeWidth(segment);
		if (currentWidth + width > targetWidth) {
			break;
		}
		result += segment;
		currentWidth += width;
	}

	return result + ellipsis;
}

/**
 * Pad text with trailing spaces to reach a visible width.
 * Text already at or beyond the width is returned unchanged.
 */
export function padToWidth(text: string, width: number): string {
	const paddingNeeded = Math.max(0, width - visibleWidth(text));
	return text + " ".repeat(paddingNeeded);
}
