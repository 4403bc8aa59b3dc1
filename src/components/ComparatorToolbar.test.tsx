import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, it, vi } from "vitest";
import { ComparatorToolbar } from "./ComparatorToolbar";

function renderToolbar(overrides?: Partial<Parameters<typeof ComparatorToolbar>[0]>) {
  const props = {
    locale: "en-US" as const,
    language: "php" as const,
    theme: "dark" as const,
    autoDetectActive: false,
    onLanguageChange: vi.fn(),
    onSwap: vi.fn(),
    onClear: vi.fn(),
    onToggleTheme: vi.fn(),
    ...overrides,
  };

  render(<ComparatorToolbar {...props} />);
  return props;
}

describe("ComparatorToolbar", () => {
  it("shows the selected language", () => {
    renderToolbar();
    expect(screen.getByLabelText("Select Language")).toHaveValue("php");
    expect(screen.getByRole("option", { name: "PHP / Laravel (Blade)" })).toBeInTheDocument();
  });

  it("reports known languages picked from the selector", () => {
    const props = renderToolbar();
    fireEvent.change(screen.getByLabelText("Select Language"), { target: { value: "sql" } });
    expect(props.onLanguageChange).toHaveBeenCalledWith("sql");
  });

  it("shows the auto-detect badge only while detection drives the language", () => {
    renderToolbar({ autoDetectActive: true });
    expect(screen.getByText("Auto-detect active")).toBeInTheDocument();
  });

  it("hides the auto-detect badge otherwise", () => {
    renderToolbar();
    expect(screen.queryByText("Auto-detect active")).toBeNull();
  });

  it("wires swap, clear and theme buttons", () => {
    const props = renderToolbar();

    fireEvent.click(screen.getByRole("button", { name: "Swap" }));
    fireEvent.click(screen.getByRole("button", { name: "Clear" }));
    fireEvent.click(screen.getByRole("button", { name: "Toggle theme" }));

    expect(props.onSwap).toHaveBeenCalledTimes(1);
    expect(props.onClear).toHaveBeenCalledTimes(1);
    expect(props.onToggleTheme).toHaveBeenCalledTimes(1);
  });

  it("localizes its labels", () => {
    renderToolbar({ locale: "es-ES" });
    expect(screen.getByRole("button", { name: "Intercambiar" })).toBeInTheDocument();
    expect(screen.getByLabelText("Seleccionar lenguaje")).toBeInTheDocument();
  });
});
