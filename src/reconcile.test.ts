import { describe, expect, it } from "vitest";

import { reconcile } from "./reconcile.js";

describe("reconcile", () => {
  it("takes the polled value when nothing is outstanding", () => {
    expect(reconcile(40, 75, false)).toBe(75);
    expect(reconcile(null, 0, false)).toBe(0);
  });

  it("keeps the displayed value while a command is outstanding", () => {
    expect(reconcile(100, 0, true)).toBe(100);
  });

  it("keeps the displayed value when the device is absent from the poll", () => {
    expect(reconcile(30, undefined, false)).toBe(30);
    expect(reconcile(null, undefined, true)).toBeNull();
  });
});
