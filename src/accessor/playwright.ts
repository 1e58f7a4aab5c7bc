/**
 * Playwright Accessor
 *
 * Exposes an already navigated Playwright page as a PageAccessor. Waiting
 * for network idle or any other readiness signal is left to the caller.
 * Each read is a single evaluate() on the element handle; raw animation and
 * attribute data is summarized on the Node side.
 */

import type { ElementHandle, Page } from "playwright-core";
import { ANIMATION_KEYS, summarizeAnimation, summarizeComponent, type RawAnimationStyles } from "../hints.js";
import type { ComputedStyleSubset, ElementAccessor, PageAccessor, StyleKey } from "../types.js";

type PageElementHandle = ElementHandle<HTMLElement | SVGElement>;

function wrapHandle(handle: PageElementHandle): ElementAccessor {
	return {
		tagName: () => handle.evaluate((el) => el.tagName.toLowerCase()),

		async boundingBox() {
			const box = await handle.boundingBox();
			return box ? { x: box.x, y: box.y, width: box.width, height: box.height } : null;
		},

		textContent: () => handle.evaluate((el) => el.textContent ?? ""),

		classList: () => handle.evaluate((el) => Array.from(el.classList)),

		id: () => handle.evaluate((el) => el.id || null),

		ariaRole: () => handle.evaluate((el) => el.getAttribute("role")),

		isVisible: () =>
			handle.evaluate((el) => {
				const style = window.getComputedStyle(el);
				// SVG elements have no offset box
				const sized =
					el instanceof HTMLElement
						? el.offsetWidth > 0 && el.offsetHeight > 0
						: el.getBoundingClientRect().width > 0 && el.getBoundingClientRect().height > 0;
				return style.display !== "none" && style.visibility !== "hidden" && style.opacity !== "0" && sized;
			}),

		hasChildren: () => handle.evaluate((el) => el.children.length > 0),

		computedStyle: (keys: readonly StyleKey[]) =>
			handle.evaluate((el, styleKeys) => {
				const style = window.getComputedStyle(el);
				const values: ComputedStyleSubset = {};
				for (const key of styleKeys) {
					values[key] = style.getPropertyValue(key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`));
				}
				return values;
			}, [...keys]),

		async detectAnimation() {
			const raw = await handle.evaluate((el, animationKeys) => {
				const style = window.getComputedStyle(el);
				const values: RawAnimationStyles = {};
				for (const key of animationKeys) {
					values[key] = style.getPropertyValue(key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`));
				}
				return values;
			}, [...ANIMATION_KEYS]);
			return summarizeAnimation(raw);
		},

		async detectComponentHints() {
			const raw = await handle.evaluate((el) => ({
				attributes: Array.from(el.attributes, (attr) => ({ name: attr.name, value: attr.value })),
				classList: Array.from(el.classList),
			}));
			return summarizeComponent(raw);
		},

		dispose: () => handle.dispose(),
	};
}

/**
 * Wrap a Playwright page. Handles beyond `maxCount` are disposed right away;
 * the rest are disposed by the collector once read.
 */
export function createPlaywrightAccessor(page: Page): PageAccessor {
	return {
		async viewport() {
			return page.viewportSize();
		},

		async enumerateElements(rootSelector: string, maxCount: number) {
			const handles = await page.$$(rootSelector);
			await Promise.all(handles.slice(maxCount).map((handle) => handle.dispose()));
			return handles.slice(0, maxCount).map(wrapHandle);
		},
	};
}
