import { describe, expect, it, vi } from "vitest";
import { createSnapshotAccessor, parsePageSnapshot } from "./accessor/snapshot.js";
import { collectElement, collectElements } from "./collector.js";
import { DEFAULT_CONFIG, resolveConfig } from "./config.js";
import type { ElementAccessor, PageAccessor } from "./types.js";

const box = { x: 0, y: 0, width: 200, height: 100 };

const snapshot = parsePageSnapshot({
	viewport: { width: 1280, height: 800 },
	elements: [
		{ tag: "SCRIPT", box },
		{ tag: "h2", box, text: "  Our plans \n", classes: ["title"], id: "plans", styles: { display: "block" } },
		{ tag: "div", box: null },
		{ tag: "div", box: { x: 0, y: 0, width: 0, height: 40 } },
		{ tag: "span", box, text: "hidden", visible: false },
		{ tag: "div", box, fail: true },
		{ tag: "div", box, classes: ["bg-cover"], hasChildren: true, attributes: [{ name: "data-component", value: "Banner" }] },
	],
});

async function handles(): Promise<ElementAccessor[]> {
	return createSnapshotAccessor(snapshot).enumerateElements("body *", 100);
}

describe("collectElement", () => {
	it("snapshots a visible element", async () => {
		const [, heading] = await handles();
		expect(await collectElement(heading)).toEqual({
			ok: true,
			element: {
				tag: "h2",
				boundingBox: box,
				textContent: "Our plans",
				classNames: ["title"],
				id: "plans",
				role: null,
				elementType: "text",
				isVisible: true,
				hasChildren: false,
				computedStyles: { display: "block" },
				animations: null,
				componentInfo: null,
			},
		});
	});

	it("reports why an element was skipped", async () => {
		const all = await handles();
		expect(await collectElement(all[0])).toEqual({ ok: false, reason: "structural", detail: "script" });
		expect(await collectElement(all[2])).toEqual({ ok: false, reason: "no-area", detail: "div" });
		expect(await collectElement(all[3])).toEqual({ ok: false, reason: "no-area", detail: "div" });
		expect(await collectElement(all[4])).toEqual({ ok: false, reason: "hidden", detail: "span" });
		expect(await collectElement(all[5])).toEqual({ ok: false, reason: "error", detail: "Element <div> is detached" });
	});

	it("attaches component hints", async () => {
		const all = await handles();
		const outcome = await collectElement(all[6]);
		expect(outcome.ok && outcome.element.elementType).toBe("image");
		expect(outcome.ok && outcome.element.componentInfo).toEqual({
			reactComponent: true,
			componentId: "Banner",
			dataAttributes: { component: "Banner" },
		});
	});
});

describe("collectElements", () => {
	it("keeps collected elements in document order and counts skips", async () => {
		const report = await collectElements(createSnapshotAccessor(snapshot), DEFAULT_CONFIG);
		expect(report.scanned).toBe(7);
		expect(report.elements.map((el) => el.tag)).toEqual(["h2", "div"]);
		expect(report.skipped).toEqual({ structural: 1, "no-area": 2, hidden: 1, error: 1 });
	});

	it("bounds the scan by maxElements", async () => {
		const report = await collectElements(createSnapshotAccessor(snapshot), resolveConfig({ maxElements: 2 }));
		expect(report.scanned).toBe(2);
		expect(report.elements.map((el) => el.tag)).toEqual(["h2"]);
	});

	it("bounds the scan when the accessor ignores maxCount", async () => {
		const accessor: PageAccessor = {
			viewport: async () => null,
			enumerateElements: async () => createSnapshotAccessor(snapshot).enumerateElements("body *", 100),
		};
		const report = await collectElements(accessor, resolveConfig({ maxElements: 3 }));
		expect(report.scanned).toBe(3);
	});

	it("releases every handle it reads, including skipped and failing ones", async () => {
		const dispose = vi.fn(async () => {});
		const accessor: PageAccessor = {
			viewport: async () => null,
			enumerateElements: async (_selector, maxCount) =>
				(await handles()).slice(0, maxCount).map((handle) => ({ ...handle, dispose })),
		};
		await collectElements(accessor, DEFAULT_CONFIG);
		expect(dispose).toHaveBeenCalledTimes(7);
	});

	it("releases handles beyond maxElements when the accessor ignores maxCount", async () => {
		const dispose = vi.fn(async () => {});
		const accessor: PageAccessor = {
			viewport: async () => null,
			enumerateElements: async () => (await handles()).map((handle) => ({ ...handle, dispose })),
		};
		const report = await collectElements(accessor, resolveConfig({ maxElements: 3 }));
		expect(report.scanned).toBe(3);
		expect(dispose).toHaveBeenCalledTimes(7);
	});

	it("keeps scanning when a handle cannot be released", async () => {
		const accessor: PageAccessor = {
			viewport: async () => null,
			enumerateElements: async () =>
				(await handles()).map((handle) => ({
					...handle,
					dispose: async () => {
						throw new Error("Target closed");
					},
				})),
		};
		const report = await collectElements(accessor, DEFAULT_CONFIG);
		expect(report.elements.map((el) => el.tag)).toEqual(["h2", "div"]);
	});

	it("rejects when enumeration fails", async () => {
		const accessor: PageAccessor = {
			viewport: async () => null,
			enumerateElements: async () => {
				throw new Error("Target page has been closed");
			},
		};
		await expect(collectElements(accessor, DEFAULT_CONFIG)).rejects.toThrow("Target page has been closed");
	});
});
