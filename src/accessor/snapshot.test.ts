import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { STYLE_KEYS } from "../types.js";
import { createSnapshotAccessor, parsePageSnapshot, readPageSnapshot } from "./snapshot.js";

const FIXTURE = fileURLToPath(new URL("../../test/fixtures/pricing-page.json", import.meta.url));

describe("parsePageSnapshot", () => {
	it("fills element defaults", () => {
		const snapshot = parsePageSnapshot({ elements: [{ tag: "div" }] });
		expect(snapshot).toEqual({
			viewport: null,
			elements: [
				{
					tag: "div",
					box: null,
					text: "",
					classes: [],
					id: null,
					role: null,
					visible: true,
					hasChildren: false,
					styles: {},
					animationStyles: {},
					attributes: [],
					fail: false,
				},
			],
		});
	});

	it("rejects negative sizes and missing tags", () => {
		expect(() => parsePageSnapshot({ elements: [{ tag: "div", box: { x: 0, y: 0, width: -1, height: 10 } }] })).toThrow(
			ZodError,
		);
		expect(() => parsePageSnapshot({ elements: [{ text: "orphan" }] })).toThrow(ZodError);
	});
});

describe("createSnapshotAccessor", () => {
	const snapshot = parsePageSnapshot({
		viewport: { width: 1024, height: 768 },
		elements: [
			{
				tag: "div",
				box: { x: 1, y: 2, width: 3, height: 4 },
				styles: { display: "grid", gap: "16px" },
				animationStyles: { transition: "opacity 0.2s", transform: "none" },
			},
			{ tag: "p" },
			{ tag: "p" },
		],
	});

	it("reports the viewport", async () => {
		expect(await createSnapshotAccessor(snapshot).viewport()).toEqual({ width: 1024, height: 768 });
		expect(await createSnapshotAccessor({ ...snapshot, viewport: null }).viewport()).toBeNull();
	});

	it("limits enumeration to maxCount", async () => {
		expect(await createSnapshotAccessor(snapshot).enumerateElements("main *", 2)).toHaveLength(2);
	});

	it("returns only the requested styles that are present", async () => {
		const [first] = await createSnapshotAccessor(snapshot).enumerateElements("body *", 10);
		expect(await first.computedStyle(["display", "alignItems"])).toEqual({ display: "grid" });
		expect(await first.computedStyle(STYLE_KEYS)).toEqual({ display: "grid", gap: "16px" });
		expect(await first.detectAnimation()).toEqual({ transition: "opacity 0.2s" });
	});
});

describe("readPageSnapshot", () => {
	it("loads and validates a JSON file", async () => {
		const snapshot = await readPageSnapshot(FIXTURE);
		expect(snapshot.viewport).toEqual({ width: 1440, height: 900 });
		expect(snapshot.elements.map((el) => el.tag)).toEqual(["header", "h1", "div", "div", "div", "footer"]);
	});
});
