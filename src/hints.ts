/**
 * Animation and component hint detection.
 *
 * The browser side only reads raw computed-style values and attributes; these
 * functions turn that raw data into the descriptors attached to slots.
 *
 * @module hints
 */

import {
	COMPONENT_CLASS_TOKENS,
	IGNORED_DATA_ATTRIBUTES,
	REACT_COMPONENT_ATTRIBUTES,
} from "./keywords.js";
import type { AnimationInfo, ComponentInfo } from "./types.js";

export const ANIMATION_KEYS = [
	"animation",
	"animationName",
	"animationDuration",
	"animationTimingFunction",
	"animationDelay",
	"animationIterationCount",
	"animationDirection",
	"transition",
	"transitionProperty",
	"transitionDuration",
	"transitionTimingFunction",
	"transform",
] as const satisfies ReadonlyArray<keyof AnimationInfo>;

export type AnimationKey = (typeof ANIMATION_KEYS)[number];

export type RawAnimationStyles = Partial<Record<AnimationKey, string | null>>;

export interface RawAttribute {
	name: string;
	value: string;
}

export interface RawComponentData {
	attributes: readonly RawAttribute[];
	classList: readonly string[];
}

const PASCAL_CASE = /^[A-Z][a-zA-Z]*$/;

function isSet(value: string | null | undefined): value is string {
	return value !== undefined && value !== null && value !== "" && value !== "none";
}

const ANIMATION_GROUP = [
	"animation",
	"animationName",
	"animationDuration",
	"animationTimingFunction",
	"animationDelay",
	"animationIterationCount",
	"animationDirection",
] as const satisfies ReadonlyArray<AnimationKey>;

const TRANSITION_GROUP = [
	"transition",
	"transitionProperty",
	"transitionDuration",
	"transitionTimingFunction",
] as const satisfies ReadonlyArray<AnimationKey>;

/** CSS initial values, as computed styles report them */
const INITIAL_VALUES: Partial<Record<AnimationKey, string>> = {
	animationDuration: "0s",
	animationTimingFunction: "ease",
	animationDelay: "0s",
	animationIterationCount: "1",
	animationDirection: "normal",
	transitionProperty: "all",
	transitionTimingFunction: "ease",
	transitionDuration: "0s",
};

const TIME_VALUE = /(\d*\.?\d+)(ms|s)\b/;

/** True when any comma-separated entry starts its timing with a non-zero time. */
function hasNonZeroTime(value: string): boolean {
	return value.split(",").some((entry) => {
		const match = TIME_VALUE.exec(entry);
		return match !== null && Number.parseFloat(match[1]) > 0;
	});
}

function isAnimating(raw: RawAnimationStyles): boolean {
	const name = raw.animationName;
	if (name !== undefined && name !== null && name !== "") return name !== "none";
	// Without the longhand, an expanded default shorthand starts with "none"
	return isSet(raw.animation) && !raw.animation.startsWith("none");
}

function isTransitioning(raw: RawAnimationStyles): boolean {
	const duration = raw.transitionDuration;
	if (duration !== undefined && duration !== null && duration !== "") return hasNonZeroTime(duration);
	return isSet(raw.transition) && hasNonZeroTime(raw.transition);
}

/**
 * Describe what actually animates: a named animation, a transition with a
 * non-zero duration, or a transform. Values equal to the CSS initial value
 * are left out. Returns null when nothing animates.
 */
export function summarizeAnimation(raw: RawAnimationStyles): AnimationInfo | null {
	const keys: AnimationKey[] = [];
	if (isAnimating(raw)) keys.push(...ANIMATION_GROUP);
	if (isTransitioning(raw)) keys.push(...TRANSITION_GROUP);
	if (isSet(raw.transform)) keys.push("transform");

	const info: AnimationInfo = {};
	for (const key of keys) {
		const value = raw[key];
		if (isSet(value) && value !== INITIAL_VALUES[key]) info[key] = value;
	}
	return Object.keys(info).length > 0 ? info : null;
}

/**
 * Derive component markers (React/Vue/Angular attributes, data-* attributes,
 * component-like class names). Returns null when nothing was found.
 */
export function summarizeComponent(raw: RawComponentData): ComponentInfo | null {
	const info: ComponentInfo = {};
	const byName = new Map(raw.attributes.map((attr) => [attr.name, attr.value]));

	for (const name of REACT_COMPONENT_ATTRIBUTES) {
		const value = byName.get(name);
		if (value) {
			info.reactComponent = true;
			info.componentId = value;
			break;
		}
	}

	const dataAttributes: Record<string, string> = {};
	for (const { name, value } of raw.attributes) {
		if (!name.startsWith("data-")) continue;
		const key = name.slice("data-".length);
		if (!IGNORED_DATA_ATTRIBUTES.has(key)) dataAttributes[key] = value;
	}
	if (Object.keys(dataAttributes).length > 0) {
		info.dataAttributes = dataAttributes;
	}

	const componentClasses = raw.classList.filter(
		(cls) => COMPONENT_CLASS_TOKENS.some((token) => cls.includes(token)) || PASCAL_CASE.test(cls),
	);
	if (componentClasses.length > 0) {
		info.componentClasses = componentClasses;
	}

	// Scoped-style attributes look like data-v-7ba5bd90
	if (raw.attributes.some((attr) => attr.name.startsWith("data-v-"))) {
		info.vueComponent = true;
	}

	if (raw.attributes.some((attr) => attr.name === "ng-version" || attr.name.startsWith("_ngcontent"))) {
		info.angularComponent = true;
	}

	return Object.keys(info).length > 0 ? info : null;
}
