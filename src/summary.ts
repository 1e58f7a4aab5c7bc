/**
 * Pattern Summarizer
 *
 * Condenses sections and slots into the page-level pattern summary:
 * run-length deduplicated role sequence, feature flags, and the layout
 * strategy histogram.
 *
 * @module summary
 */

import { normalizeRole } from "./classifier.js";
import type { DisplayType, LayoutRole, PatternFeatures, PatternSummary, Section, Slot } from "./types.js";

export const NO_FEATURES: Readonly<PatternFeatures> = {
	hasNavigation: false,
	hasHero: false,
	hasCardGrid: false,
	hasFooter: false,
	hasImages: false,
	hasRepeatedGroups: false,
};

/**
 * Canonical section roles with adjacent duplicates collapsed.
 * Non-adjacent repeats are kept.
 */
export function buildPatternSequence(sections: readonly Section[]): LayoutRole[] {
	const sequence: LayoutRole[] = [];
	for (const section of sections) {
		const role = normalizeRole(section.role);
		if (sequence[sequence.length - 1] !== role) sequence.push(role);
	}
	return sequence;
}

export function detectFeatures(sections: readonly Section[], slots: readonly Slot[]): PatternFeatures {
	const slotRoles = slots.map((slot) => normalizeRole(slot.role));
	const sectionRoles = sections.map((section) => normalizeRole(section.role));

	return {
		hasNavigation: slotRoles.some((role) => role.includes("navigation")),
		hasHero: sectionRoles.some((role) => role.includes("hero")),
		hasCardGrid: sectionRoles.some((role) => role.includes("card-grid")),
		hasFooter: slotRoles.some((role) => role.includes("footer")),
		hasImages: slots.some((slot) => slot.type === "image"),
		hasRepeatedGroups: slots.some((slot) => slot.repeated),
	};
}

/**
 * Section count per display type, in first-seen order.
 */
export function layoutDistribution(sections: readonly Section[]): Map<DisplayType, number> {
	const counts = new Map<DisplayType, number>();
	for (const section of sections) {
		const displayType = section.layoutHints.displayType;
		counts.set(displayType, (counts.get(displayType) ?? 0) + 1);
	}
	return counts;
}

/**
 * Most frequent display type; the first seen wins ties. Defaults to flex.
 */
export function dominantLayout(distribution: ReadonlyMap<DisplayType, number>): DisplayType {
	let dominant: DisplayType = "flex";
	let best = 0;
	for (const [displayType, count] of distribution) {
		if (count > best) {
			dominant = displayType;
			best = count;
		}
	}
	return dominant;
}

export function summarizePatterns(sections: readonly Section[], slots: readonly Slot[], patternTypeLength = 5): PatternSummary {
	const patternSequence = buildPatternSequence(sections);
	const distribution = layoutDistribution(sections);

	return {
		patternType: patternSequence.slice(0, patternTypeLength).join("-") || "unknown",
		patternSequence,
		sectionCount: sections.length,
		slotCount: slots.length,
		features: detectFeatures(sections, slots),
		dominantLayout: dominantLayout(distribution),
		layoutDistribution: Object.fromEntries(distribution),
	};
}
