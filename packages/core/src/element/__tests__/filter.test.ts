import { assert, describe, test } from "@flexweave/testkit";
import { px } from "../../style/length.js";
import {
  alignLeft,
  alignRight,
  noAttribute,
  padding,
  spacing,
  width,
} from "../../widgets/attributes.js";
import { extractSpacingAndPadding, filterAttributes, getAttributes } from "../filter.js";

describe("filterAttributes", () => {
  test("keeps the last per slot and drops no-ops", () => {
    const filtered = filterAttributes([width(px(1)), noAttribute, padding(3), width(px(2)), alignLeft, alignRight]);
    assert.deepEqual(filtered, [padding(3), width(px(2)), alignRight]);
  });

  test("getAttributes filters the resolved list", () => {
    const widths = getAttributes([width(px(1)), padding(3), width(px(2))], (a) => a.kind === "width");
    assert.deepEqual(widths, [width(px(2))]);
  });
});

describe("extractSpacingAndPadding", () => {
  test("returns the last padding and spacing", () => {
    const { padding: p, spacing: s } = extractSpacingAndPadding([padding(4), spacing(2), padding(6)]);
    assert.equal(p?.cls, "p-6");
    assert.equal(s?.cls, "spacing-2-2");
  });

  test("returns null when absent", () => {
    assert.deepEqual(extractSpacingAndPadding([alignLeft]), { padding: null, spacing: null });
  });
});
