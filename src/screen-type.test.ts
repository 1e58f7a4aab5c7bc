import { describe, expect, it } from "vitest";
import { classifyScreenType } from "./screen-type.js";

function el(classNames: string[], textContent = "") {
	return { classNames, textContent };
}

describe("classifyScreenType", () => {
	it("ranks auth above dashboard", () => {
		expect(classifyScreenType([el([], "Sign in to your dashboard")], [])).toBe("auth");
		expect(classifyScreenType([el(["auth-form"])], [{ role: "hero" }])).toBe("auth");
	});

	it("checks services before pricing", () => {
		expect(classifyScreenType([el(["service-list"]), el(["pricing"])], [])).toBe("services");
		expect(classifyScreenType([el(["pricing-table"])], [])).toBe("pricing");
	});

	it("matches portfolio and blog classes", () => {
		expect(classifyScreenType([el(["portfolio-grid"])], [])).toBe("portfolio");
		expect(classifyScreenType([el(["blog-post"])], [])).toBe("blog");
		expect(classifyScreenType([el(["article"])], [])).toBe("blog");
	});

	it("treats a hero section as a landing page", () => {
		expect(classifyScreenType([el(["intro"], "Welcome")], [{ role: "hero" }, { role: "content" }])).toBe("landing");
		expect(classifyScreenType([el(["landing"])], [])).toBe("landing");
	});

	it("falls back to dashboard keywords and then page", () => {
		expect(classifyScreenType([el([], "Analytics overview")], [{ role: "content" }])).toBe("dashboard");
		expect(classifyScreenType([el(["wrapper"], "Hello")], [{ role: "content" }])).toBe("page");
	});

	it("reports page for an empty input", () => {
		expect(classifyScreenType([], [])).toBe("page");
	});
});
