import { assert, describe, test } from "@flexweave/testkit";
import { FlexweaveError } from "../../errors.js";
import { floatClass, formatColor, formatColorClass, rgb255, rgba, toRgb } from "../color.js";

describe("color", () => {
  test("rgb255 converts each channel separately", () => {
    const c = rgb255(255, 128, 0);
    assert.equal(c.red, 1);
    assert.equal(c.green, 128 / 255);
    assert.equal(c.blue, 0);
    assert.equal(c.alpha, 1);
  });

  test("formats as rgba with 0..255 channels and raw alpha", () => {
    assert.equal(formatColor(rgb255(255, 128, 0)), "rgba(255,128,0,1)");
    assert.equal(formatColorClass(rgb255(255, 128, 0)), "255-128-0-255");
  });

  test("rgba clamps channels into 0..1", () => {
    const c = rgba(2, -1, 0.5, 0.5);
    assert.deepEqual(toRgb(c), { red: 1, green: 0, blue: 0.5, alpha: 0.5 });
    assert.equal(formatColor(c), "rgba(255,0,128,0.5)");
    assert.equal(formatColorClass(c), "255-0-128-128");
  });

  test("floatClass rounds x * 255", () => {
    assert.equal(floatClass(0), "0");
    assert.equal(floatClass(1), "255");
    assert.equal(floatClass(0.5), "128");
    assert.equal(floatClass(2), "510");
  });

  test("non-finite channels are rejected", () => {
    assert.throws(
      () => rgba(Number.NaN, 0, 0, 1),
      (err: unknown) => err instanceof FlexweaveError && err.code === "FW_INVALID_PROPS",
    );
  });
});
