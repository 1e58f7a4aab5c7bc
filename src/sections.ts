/**
 * Section Assembler
 *
 * Bins slots into horizontal bands by normalized y and turns each band
 * into a section with a role, layout hints and aggregated slot metadata.
 *
 * @module sections
 */

import { normalizeRole } from "./classifier.js";
import type { AnalyzerConfig } from "./config.js";
import { detectGridLayout } from "./groups.js";
import type { FlexLayoutHints, LayoutRole, Section, SectionAnimation, SectionComponent, Slot } from "./types.js";

export const DEFAULT_FLEX_HINTS: Readonly<FlexLayoutHints> = {
	displayType: "flex",
	flexDirection: "column",
	gap: 24,
	alignment: "start",
};

/**
 * Section role: hero if any member is hero-like, card-grid if any member is
 * a card or grid, content otherwise.
 */
export function resolveSectionRole(roles: readonly LayoutRole[]): LayoutRole {
	if (roles.some((role) => role.includes("hero"))) return normalizeRole("hero");
	if (roles.some((role) => role.includes("card") || role.includes("grid"))) return normalizeRole("card-grid");
	return normalizeRole("content");
}

/**
 * Group slots into bands of `sectionTolerance` viewport height, top to
 * bottom. Every slot lands in exactly one band; slot order is kept inside
 * a band.
 */
export function binSlotsByRow(slots: readonly Slot[], tolerance: number): Slot[][] {
	const bins = new Map<number, Slot[]>();
	for (const slot of slots) {
		const key = Math.round(slot.boundingBox.y / tolerance);
		const bin = bins.get(key);
		if (bin) {
			bin.push(slot);
		} else {
			bins.set(key, [slot]);
		}
	}

	return [...bins.entries()].sort(([a], [b]) => a - b).map(([, bin]) => bin);
}

export function assembleSections(slots: readonly Slot[], config: AnalyzerConfig): Section[] {
	const sections: Section[] = [];

	for (const bin of binSlotsByRow(slots, config.sectionTolerance)) {
		const role = resolveSectionRole(bin.map((slot) => slot.role));
		const layoutHints = detectGridLayout(bin, config.gridRowTolerance) ?? { ...DEFAULT_FLEX_HINTS };

		const animations: SectionAnimation[] = [];
		const components: SectionComponent[] = [];
		for (const slot of bin) {
			if (slot.animations) animations.push({ slotId: slot.id, animation: slot.animations });
			if (slot.componentInfo) components.push({ slotId: slot.id, component: slot.componentInfo });
		}

		sections.push({
			id: `section-${role}-${sections.length}`,
			role,
			layoutHints,
			slotIds: bin.map((slot) => slot.id),
			animations,
			components,
		});
	}

	return sections;
}
