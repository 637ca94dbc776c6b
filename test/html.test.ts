import { describe, it, expect } from "vitest";
import { escapeHtml, html, SafeHtml } from "../src/views/html.js";
import { formatPrice } from "../src/views/pages.js";

describe("html", () => {
  it("escapes interpolated text", () => {
    expect(html`<p>${'<b>"Tom" & \'Jerry\'</b>'}</p>`.value).toBe(
      "<p>&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;</p>",
    );
  });

  it("passes nested markup through and joins arrays", () => {
    const items = ["a<", "b"].map((s) => html`<li>${s}</li>`);
    expect(html`<ul>${items}</ul>`.value).toBe("<ul><li>a&lt;</li><li>b</li></ul>");
  });

  it("renders null, undefined and false as nothing but keeps zero", () => {
    expect(html`[${null}${undefined}${false}${0}]`.value).toBe("[0]");
  });

  it("stringifies SafeHtml as its markup", () => {
    expect(String(new SafeHtml("<br>"))).toBe("<br>");
    expect(escapeHtml("plain")).toBe("plain");
  });
});

describe("formatPrice", () => {
  it("shows two decimals", () => {
    expect(formatPrice(80)).toBe("80.00");
    expect(formatPrice(45.5)).toBe("45.50");
  });
});
