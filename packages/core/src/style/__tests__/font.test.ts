import { assert, describe, test } from "@flexweave/testkit";
import { FlexweaveError } from "../../errors.js";
import {
  type Font,
  adjustmentRules,
  cssString,
  fontFamilyClassName,
  fontName,
  hasSmallCaps,
  renderFeatureSettings,
  typefaceAdjustment,
} from "../font.js";

const withVariants: Font = {
  kind: "fontWith",
  name: "Inter",
  adjustment: null,
  variants: [
    { kind: "active", name: "smcp" },
    { kind: "indexed", name: "ss01", index: 2 },
  ],
};

describe("font names", () => {
  test("named faces are quoted, generic families are not", () => {
    assert.equal(fontName({ kind: "typeface", name: "Open Sans" }), '"Open Sans"');
    assert.equal(fontName({ kind: "sansSerif" }), "sans-serif");
  });

  test("family class concatenates lowercased, dashed names", () => {
    assert.equal(
      fontFamilyClassName([{ kind: "typeface", name: "Fira Code" }, { kind: "monospace" }]),
      "ff-fira-codemonospace",
    );
  });

  test("characters outside the class alphabet become dashes", () => {
    assert.equal(fontFamilyClassName([{ kind: "typeface", name: 'A.B "C"' }]), "ff-a-b--c-");
  });

  test("quotes, backslashes and angle brackets are escaped in quoted names", () => {
    assert.equal(fontName({ kind: "typeface", name: 'Say "Hi"' }), '"Say \\"Hi\\""');
    assert.equal(cssString("a\\b</c", "'"), "'a\\\\b\\3c /c'");
  });
});

describe("font variants", () => {
  test("feature settings list every variant", () => {
    assert.equal(renderFeatureSettings([withVariants]), '"smcp", "ss01" 2');
    assert.equal(renderFeatureSettings([{ kind: "serif" }]), null);
  });

  test("small caps are detected", () => {
    assert.equal(hasSmallCaps([withVariants]), true);
    assert.equal(hasSmallCaps([{ kind: "serif" }]), false);
  });
});

describe("font adjustment", () => {
  const adjustment = { capital: 0.75, lowercase: 0.5, baseline: 0.25, descender: 0 };

  test("capital sizing scales the capital band to the em box", () => {
    const rules = adjustmentRules(adjustment);
    assert.deepEqual(rules.capital.parent, [["display", "block"]]);
    assert.deepEqual(rules.capital.text, [
      ["display", "inline-block"],
      ["line-height", "0.25"],
      ["vertical-align", "0.25em"],
      ["font-size", "2em"],
    ]);
  });

  test("the first face with metrics wins", () => {
    const fonts: readonly Font[] = [
      withVariants,
      { kind: "fontWith", name: "Metric", adjustment, variants: [] },
    ];
    assert.deepEqual(typefaceAdjustment(fonts), adjustmentRules(adjustment));
    assert.equal(typefaceAdjustment([{ kind: "serif" }]), null);
  });
});

describe("font adjustment: invalid metrics", () => {
  const invalid = (err: unknown) => err instanceof FlexweaveError && err.code === "FW_INVALID_PROPS";

  test("equal metrics have no capital band", () => {
    assert.throws(() => adjustmentRules({ capital: 0.5, lowercase: 0.5, baseline: 0.5, descender: 0.5 }), invalid);
  });

  test("a capital band of zero height is rejected", () => {
    assert.throws(() => adjustmentRules({ capital: 0.5, lowercase: 0.5, baseline: 0.5, descender: 0 }), invalid);
  });

  test("non-finite metrics are rejected", () => {
    assert.throws(
      () => adjustmentRules({ capital: Number.POSITIVE_INFINITY, lowercase: 0.5, baseline: 0.25, descender: 0 }),
      invalid,
    );
  });
});
