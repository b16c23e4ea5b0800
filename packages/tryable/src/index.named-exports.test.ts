import { describe, expect, it } from "vitest";
import * as root from "./index";
import * as errors from "./errors-entry";
import * as throwing from "./throwing-entry";
import * as unchecker from "./unchecker-entry";
import * as core from "./core-entry";

describe("root named exports", () => {
  it("re-exports the entry points' values", () => {
    expect(root.ValueTry).toBe(core.ValueTry);
    expect(root.CHECKED).toBe(core.CHECKED);
    expect(root.TFunction).toBe(throwing.TFunction);
    expect(root.TComparator).toBe(throwing.TComparator);
    expect(root.IO_UNCHECKER).toBe(unchecker.IO_UNCHECKER);
    expect(root.Unchecker).toBe(unchecker.Unchecker);
    expect(root.IllegalStateError).toBe(errors.IllegalStateError);
    expect(root.isChecked).toBe(errors.isChecked);
  });

  it("builds equal outcomes through the root and core entry points", () => {
    expect(root.Try.success(1).equals(core.ValueTry.success(core.CHECKED, 1))).toBe(true);
    expect(
      root.TryCatchAllVoid.success().equals(core.VoidTry.success(core.CATCH_ALL))
    ).toBe(true);
  });
});
