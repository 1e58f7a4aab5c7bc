import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "./config.js";
import { assembleSections, binSlotsByRow, resolveSectionRole } from "./sections.js";
import { makeSlot } from "./testing/builders.js";

function atY(id: string, y: number, role = "content") {
	return makeSlot({ id, role, boundingBox: { x: 0, y, width: 0.1, height: 0.1 } });
}

describe("resolveSectionRole", () => {
	it("prefers hero, then card-grid, then content", () => {
		expect(resolveSectionRole(["headline", "hero-image"])).toBe("hero");
		expect(resolveSectionRole(["content", "card"])).toBe("card-grid");
		expect(resolveSectionRole(["card-grid"])).toBe("card-grid");
		expect(resolveSectionRole(["body-text", "image"])).toBe("content");
	});
});

describe("binSlotsByRow", () => {
	it("bins by rounded y and orders bins top to bottom", () => {
		const slots = [atY("a", 0.02), atY("b", 0.08), atY("c", 0.31), atY("d", 0.12), atY("e", 0)];
		const bins = binSlotsByRow(slots, 0.1);
		expect(bins.map((bin) => bin.map((slot) => slot.id))).toEqual([["a", "e"], ["b", "d"], ["c"]]);
	});
});

describe("assembleSections", () => {
	const animation = { transform: "scale(1.1)" };
	const component = { reactComponent: true, componentId: "FeatureCard" };
	const slots = [
		makeSlot({ id: "cta", role: "cta", boundingBox: { x: 0, y: 0.02, width: 0.2, height: 0.1 }, animations: animation }),
		makeSlot({ id: "c1", role: "card", boundingBox: { x: 0, y: 0.4, width: 0.3, height: 0.2 }, componentInfo: component }),
		makeSlot({ id: "c2", role: "card", boundingBox: { x: 0.35, y: 0.4, width: 0.3, height: 0.2 } }),
		makeSlot({ id: "c3", role: "card", boundingBox: { x: 0.7, y: 0.4, width: 0.3, height: 0.2 } }),
		makeSlot({ id: "h", role: "hero", boundingBox: { x: 0, y: 0.8, width: 1, height: 0.2 } }),
	];

	it("builds one section per band with role-based ids", () => {
		const sections = assembleSections(slots, DEFAULT_CONFIG);
		expect(sections.map((section) => [section.id, section.role, section.slotIds])).toEqual([
			["section-content-0", "content", ["cta"]],
			["section-card-grid-1", "card-grid", ["c1", "c2", "c3"]],
			["section-hero-2", "hero", ["h"]],
		]);
	});

	it("uses grid hints for a row of slots and flex otherwise", () => {
		const sections = assembleSections(slots, DEFAULT_CONFIG);
		expect(sections[0].layoutHints).toEqual({ displayType: "flex", flexDirection: "column", gap: 24, alignment: "start" });
		expect(sections[1].layoutHints).toEqual({ displayType: "grid", gridColumns: 3, gap: 0.05, alignment: "center" });
	});

	it("aggregates animations and components by slot", () => {
		const sections = assembleSections(slots, DEFAULT_CONFIG);
		expect(sections[0].animations).toEqual([{ slotId: "cta", animation }]);
		expect(sections[0].components).toEqual([]);
		expect(sections[1].components).toEqual([{ slotId: "c1", component }]);
	});

	it("places every slot in exactly one section", () => {
		const ids = assembleSections(slots, DEFAULT_CONFIG).flatMap((section) => section.slotIds);
		expect([...ids].sort()).toEqual(slots.map((slot) => slot.id).sort());
	});

	it("returns no sections for no slots", () => {
		expect(assembleSections([], DEFAULT_CONFIG)).toEqual([]);
	});
});
