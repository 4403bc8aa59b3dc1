import { describe, expect, it } from "vitest";
import { cn } from "./utils";

const TOOLBAR_BUTTON_CLASS = "flex items-center gap-1 rounded-md border px-2 py-1 text-xs";

describe("utils", () => {
  it("appends variant classes to the toolbar button base", () => {
    expect(cn(TOOLBAR_BUTTON_CLASS, "text-red-500 hover:border-red-500")).toBe(
      "flex items-center gap-1 rounded-md border px-2 py-1 text-xs text-red-500 hover:border-red-500"
    );
  });

  it("lets later spacing and size classes win", () => {
    expect(cn(TOOLBAR_BUTTON_CLASS, "px-3 text-sm")).toBe(
      "flex items-center gap-1 rounded-md border py-1 px-3 text-sm"
    );
  });

  it("lets a later text color replace the muted one", () => {
    expect(cn("text-muted-foreground", "text-red-500")).toBe("text-red-500");
  });

  it("drops an absent variant class", () => {
    expect(cn(TOOLBAR_BUTTON_CLASS, undefined)).toBe(TOOLBAR_BUTTON_CLASS);
    expect(cn("h-3 w-3", false, null)).toBe("h-3 w-3");
  });
});
