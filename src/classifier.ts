/**
 * Element Classifier
 *
 * Pure heuristics that decide what an element is:
 * - element type (image / text / container) from tag, styles and classes
 * - a raw semantic role from tag, classes, text and position
 * - canonicalization of raw roles onto the closed role vocabulary
 *
 * @module classifier
 */

import type { HeroConfig } from "./config.js";
import {
	BACKGROUND_IMAGE_TOKENS,
	BUTTON_CLASS_TOKENS,
	BUTTON_TAGS,
	CARD_TOKEN,
	GRID_TOKEN,
	HEADLINE_CLASS_TOKEN,
	HEADLINE_TAGS,
	HERO_TOKEN,
	IMAGE_TAGS,
	NAV_TOKEN,
	ROLE_ALIASES,
	SUBHEAD_TAGS,
	TEXT_TAGS,
} from "./keywords.js";
import type { ComputedStyleSubset, ElementInfo, ElementType, LayoutRole } from "./types.js";

/**
 * Raw role guesses before canonicalization.
 */
export type RawRole =
	| "hero"
	| "hero-split"
	| "card-item"
	| "card-grid"
	| "navigation"
	| "headline"
	| "subhead"
	| "cta"
	| "hero-image"
	| "image"
	| "content-block";

/** Position and size signals computed by the slot builder */
export interface RoleContext {
	/** Element top as a fraction of the viewport height */
	positionInViewport: number;
	isLarge: boolean;
	hasHeadline: boolean;
}

function classString(classNames: readonly string[]): string {
	return classNames.join(" ").toLowerCase();
}

function hasBackgroundImage(styles: ComputedStyleSubset): boolean {
	const value = styles.backgroundImage;
	return value !== undefined && value !== "" && value !== "none";
}

/**
 * Decide the element type. First match wins: media tags, background images,
 * text tags, then container.
 */
export function classifyElementType(
	tag: string,
	classNames: readonly string[],
	styles: ComputedStyleSubset,
): ElementType {
	if (IMAGE_TAGS.has(tag)) return "image";

	const classes = classString(classNames);
	if (hasBackgroundImage(styles) || BACKGROUND_IMAGE_TOKENS.some((token) => classes.includes(token))) {
		return "image";
	}

	if (TEXT_TAGS.has(tag)) return "text";

	return "container";
}

/**
 * Headline signal used by the hero heuristic: a top-level heading tag or a
 * class mentioning "headline".
 */
export function hasHeadlineSignal(element: Pick<ElementInfo, "tag" | "classNames">): boolean {
	return (
		HEADLINE_TAGS.has(element.tag) ||
		element.classNames.some((cls) => cls.toLowerCase().includes(HEADLINE_CLASS_TOKEN))
	);
}

export function isLargeElement(element: Pick<ElementInfo, "boundingBox">, hero: HeroConfig): boolean {
	return element.boundingBox.width > hero.minWidth || element.boundingBox.height > hero.minHeight;
}

/**
 * Guess a raw semantic role. Rules are checked in priority order; the
 * first one that matches wins.
 */
export function inferSemanticRole(element: ElementInfo, context: RoleContext, hero: HeroConfig): RawRole {
	const { tag } = element;
	const classes = classString(element.classNames);
	const text = element.textContent.toLowerCase();
	const inTopBand = context.positionInViewport < hero.topRatio;

	if (
		classes.includes(HERO_TOKEN) ||
		text.includes(HERO_TOKEN) ||
		(inTopBand && context.isLarge && context.hasHeadline)
	) {
		return element.hasChildren ? "hero-split" : "hero";
	}

	if (classes.includes(CARD_TOKEN) || text.includes(CARD_TOKEN)) return "card-item";

	if (classes.includes(GRID_TOKEN) || element.computedStyles.display === "grid") return "card-grid";

	if (tag === "nav" || classes.includes(NAV_TOKEN) || element.role === "navigation") return "navigation";

	if (HEADLINE_TAGS.has(tag)) return "headline";

	if (SUBHEAD_TAGS.has(tag)) return "subhead";

	if (BUTTON_TAGS.has(tag) && BUTTON_CLASS_TOKENS.some((token) => classes.includes(token))) return "cta";

	if (element.elementType === "image") {
		return inTopBand ? "hero-image" : "image";
	}

	return "content-block";
}

/**
 * Map a raw role onto the closed vocabulary. Unknown roles pass through
 * lower-cased; an empty role becomes "content".
 */
export function normalizeRole(role: string): LayoutRole {
	const lower = role.toLowerCase();
	const canonical = ROLE_ALIASES.get(lower);
	if (canonical) return canonical;
	return lower || "content";
}
