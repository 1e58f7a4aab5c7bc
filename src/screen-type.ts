/**
 * Screen Type Classifier
 *
 * Labels the whole page with a coarse archetype from the joined class names
 * and text of its elements plus the section roles. Rules are evaluated in
 * priority order: auth, services, pricing, portfolio, blog, landing,
 * dashboard, then the generic "page".
 *
 * @module screen-type
 */

import {
	AUTH_CLASS_KEYWORDS,
	AUTH_TEXT_KEYWORDS,
	DASHBOARD_KEYWORDS,
	SCREEN_KEYWORD_RULES,
} from "./keywords.js";
import type { ElementInfo, ScreenType, Section } from "./types.js";

function containsAny(haystack: string, needles: readonly string[]): boolean {
	return needles.some((needle) => haystack.includes(needle));
}

export function classifyScreenType(
	elements: readonly Pick<ElementInfo, "classNames" | "textContent">[],
	sections: readonly Pick<Section, "role">[],
): ScreenType {
	const roles = sections.map((section) => section.role);
	const classes = elements.map((el) => el.classNames.join(" ")).join(" ").toLowerCase();
	const text = elements.map((el) => el.textContent).join(" ").toLowerCase();

	if (containsAny(text, AUTH_TEXT_KEYWORDS) || containsAny(classes, AUTH_CLASS_KEYWORDS)) {
		return "auth";
	}

	for (const rule of SCREEN_KEYWORD_RULES) {
		if (
			containsAny(classes, rule.classKeywords) ||
			roles.some((role) => containsAny(role, rule.roleKeywords))
		) {
			return rule.screenType;
		}
	}

	if (containsAny(text, DASHBOARD_KEYWORDS) || containsAny(classes, DASHBOARD_KEYWORDS)) {
		return "dashboard";
	}

	return "page";
}
