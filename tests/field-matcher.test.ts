import { describe, expect, it } from "vitest";
import { matchField, matchFields, normalizeText, resolveSlotValues } from "../server/services/field-matcher.js";
import { field, profile } from "./helpers/fakes.js";

const copy = { title: "Widgets that ship themselves", description: "A longer pitch about widgets." };
const values = resolveSlotValues(profile, copy);
const options = { threshold: 0.6, categories: profile.product.categories };

describe("normalizeText", () => {
  it("splits camelCase and punctuation", () => {
    expect(normalizeText("companyURL")).toBe("company url");
    expect(normalizeText("fullName")).toBe("full name");
    expect(normalizeText("  Product_Name* ")).toBe("product name");
  });
});

describe("resolveSlotValues", () => {
  it("derives split names and username from the profile", () => {
    expect(values.first_name).toBe("Sam");
    expect(values.last_name).toBe("Rivera");
    expect(values.username).toBe("maker");
    expect(values.title).toBe(copy.title);
    expect(values.description).toBe(copy.description);
    expect(values.logo).toBeUndefined();
  });
});

describe("matchField", () => {
  it("matches exact names and labels", () => {
    expect(matchField(field({ name: "email", type: "email" }), values, options)).toMatchObject({
      slot: "email",
      score: 1,
      value: "maker@example.com",
      kind: "text"
    });
    expect(matchField(field({ name: "fullName", label: "Your full name" }), values, options)).toMatchObject({
      slot: "name",
      value: "Sam Rivera"
    });
    expect(matchField(field({ name: "product_name", label: "Product Name" }), values, options)).toMatchObject({
      slot: "product_name",
      value: "Widgetly"
    });
  });

  it("keeps product words out of the personal name and link words out of company", () => {
    expect(matchField(field({ name: "company_url" }), values, options)).toMatchObject({
      slot: "url",
      score: 0.85,
      value: "https://widgetly.example"
    });
  });

  it("leaves known-but-unfillable fields empty", () => {
    expect(matchField(field({ name: "phone", type: "tel" }), values, options)).toEqual({
      field: field({ name: "phone", type: "tel" }),
      reason: "unfillable:phone"
    });
    expect(matchField(field({ name: "contact", label: "Email address", type: "email" }), values, options)).toMatchObject({
      slot: "email"
    });
  });

  it("needs a value for the slot", () => {
    const logo = field({ name: "logo", type: "file" });
    expect(matchField(logo, values, options)).toEqual({ field: logo, reason: "no_value:logo" });

    const withLogo = resolveSlotValues({ ...profile, assets: { logoPath: "/tmp/logo.png" } }, copy);
    expect(matchField(logo, withLogo, options)).toMatchObject({ slot: "logo", value: "/tmp/logo.png", kind: "file" });
  });

  it("fills consent checkboxes and picks a category option", () => {
    expect(matchField(field({ name: "agree_terms", type: "checkbox" }), values, options)).toMatchObject({
      slot: "consent",
      kind: "check",
      value: "true"
    });
    const select = field({ name: "category", tag: "select", type: "select", options: ["Choose one", "Marketing", "Productivity"] });
    expect(matchField(select, values, options)).toMatchObject({ slot: "category", kind: "select", value: "Productivity" });
  });

  it.each([
    [{ name: "contact", label: "E-mail" }, "email"],
    [{ name: "website" }, "url"],
    [{ name: "link" }, "url"],
    [{ name: "full_name" }, "name"],
    [{ name: "yourName", label: "Your name" }, "name"],
    [{ name: "desc" }, "description"],
    [{ name: "about" }, "description"],
    [{ name: "tagline" }, "title"],
    [{ name: "headline" }, "title"]
  ])("maps %o to the %s slot", (overrides, slot) => {
    expect(matchField(field(overrides), values, options)).toMatchObject({ slot, score: 1 });
  });

  it("fills a product description box with the description, not the product name", () => {
    expect(matchField(field({ name: "product_desc", tag: "textarea", type: "textarea" }), values, options)).toMatchObject({
      slot: "description",
      value: copy.description
    });
    expect(matchField(field({ name: "product_summary" }), values, options)).toMatchObject({ slot: "description" });
  });

  it("applies the confidence threshold", () => {
    const loose = field({ name: "yourwebsite" });
    expect(matchField(loose, values, options)).toMatchObject({ slot: "url", score: 0.6 });
    expect(matchField(loose, values, { ...options, threshold: 0.7 })).toEqual({ field: loose, reason: "below_threshold" });
  });
});

describe("matchFields", () => {
  it("reports required fields no slot can fill", () => {
    const message = field({ name: "message", tag: "textarea", type: "textarea", required: true });
    const plan = matchFields([field({ name: "email" }), field({ name: "company_url" }), message], values, options);
    expect(plan.matches.map((match) => match.slot)).toEqual(["email", "url"]);
    expect(plan.unmatchedRequired).toEqual([message]);
    expect(plan.skipped).toEqual([{ field: message, reason: "below_threshold" }]);
  });
});
