import { describe, expect, it } from "vitest";
import {
  formatDateExample,
  renderNameTemplate,
  skuDisplayValue,
} from "../src/bulksheet_gen_sp_create/nameTemplate";
import { groupItems } from "../src/bulksheet_gen_sp_create/grouping";
import { validateNameTemplate } from "../src/bulksheet_gen_sp_create/validate";

describe("renderNameTemplate", () => {
  it("fills SKU and match type", () => {
    expect(
      renderNameTemplate({
        template: "SP_match_type_[SKU]",
        sku: "SKU001",
        matchType: "exact",
        startDate: "20260310",
      })
    ).toBe("SP_exact_SKU001");
  });

  it("shows grouped SKUs as the first one plus a count", () => {
    expect(
      renderNameTemplate({
        template: "SP_match_type_[SKU]",
        sku: "A1_B2_C3",
        matchType: "broad",
        startDate: "20260310",
      })
    ).toBe("SP_broad_A1+2");
  });

  it("leaves the other tokens in place", () => {
    expect(
      renderNameTemplate({
        template: "[Root]_[KW]_match_type_[SKU]",
        sku: "SKU001",
        matchType: "phrase",
        startDate: "20260310",
      })
    ).toBe("[Root]_[KW]_phrase_SKU001");
  });

  it("replaces each date example with the start date in its format", () => {
    const render = (template: string) =>
      renderNameTemplate({ template, sku: "SKU001", matchType: "exact", startDate: "20260310" });

    expect(render("[SKU]_match_type_250423")).toBe("SKU001_exact_100326");
    expect(render("[SKU]_match_type_04/23/2025")).toBe("SKU001_exact_03/10/2026");
    expect(render("[SKU]_match_type_23-04-2025")).toBe("SKU001_exact_10-03-2026");
    expect(render("[SKU]_match_type_Apr 23, 2025")).toBe("SKU001_exact_Mar 10, 2026");
  });
});

describe("formatDateExample", () => {
  it("formats month names", () => {
    expect(formatDateExample("Apr 23, 2025", "20261205")).toBe("Dec 05, 2026");
  });

  it("rejects a start date that is not YYYYMMDD", () => {
    expect(() => formatDateExample("250423", "2026-03-10")).toThrow(
      "Invalid start date: 2026-03-10. Expected YYYYMMDD."
    );
  });
});

describe("skuDisplayValue", () => {
  it("keeps a plain SKU", () => {
    expect(skuDisplayValue("SKU001")).toBe("SKU001");
  });

  it("treats an underscore inside a single SKU as a group separator", () => {
    expect(skuDisplayValue("AB_12")).toBe("AB+1");
  });
});

describe("groupItems", () => {
  it("makes singleton groups without a size", () => {
    expect(groupItems(["a", "b", "c"])).toEqual([["a"], ["b"], ["c"]]);
    expect(groupItems(["a", "b"], 0)).toEqual([["a"], ["b"]]);
    expect(groupItems(["a", "b"], null)).toEqual([["a"], ["b"]]);
  });

  it("chunks in order with a shorter tail", () => {
    expect(groupItems([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it("returns one group when the size covers everything", () => {
    expect(groupItems(["a", "b"], 10)).toEqual([["a", "b"]]);
  });

  it("returns no groups for no items", () => {
    expect(groupItems([], 3)).toEqual([]);
  });
});

describe("validated templates", () => {
  it("render without leftover SKU or match type placeholders", () => {
    const templates = [
      "SP_match_type_[SKU]",
      "[SKU]_match_type_Q3-launch",
      "Brand_[SKU]_match_type_23-04-2025",
      "[Root]_match_type_[SKU]_KW",
    ];
    for (const template of templates) {
      expect(validateNameTemplate(template, "campaign")).toEqual({ ok: true });
      const rendered = renderNameTemplate({
        template,
        sku: "SKU001_SKU002",
        matchType: "phrase",
        startDate: "20261205",
      });
      expect(rendered).not.toContain("[SKU]");
      expect(rendered).not.toContain("match_type");
      expect(rendered).toContain("SKU001+1");
    }
  });
});
