import { describe, expect, it } from "vitest";
import {
  LANGUAGE_OPTIONS,
  detectLanguage,
  getLanguageLabel,
  isLanguageKey,
  shouldAutoDetectLanguage,
} from "./languageDetection";

describe("detectLanguage", () => {
  it("recognizes each language family", () => {
    expect(detectLanguage("import Foo from 'bar'; export default Foo;")).toBe("javascript");
    expect(detectLanguage("function greet(name: string) { return name; }")).toBe("typescript");
    expect(detectLanguage("<?php echo $x; ?>")).toBe("php");
    expect(detectLanguage("<div><span>hi</span></div>")).toBe("html");
    expect(detectLanguage('{"a": 1}')).toBe("json");
    expect(detectLanguage("body { color: red; }")).toBe("css");
    expect(detectLanguage("SELECT * FROM users;")).toBe("sql");
    expect(detectLanguage("def main():\n    return 1")).toBe("python");
  });

  it("falls back to plaintext for empty or unrecognized input", () => {
    expect(detectLanguage("")).toBe("plaintext");
    expect(detectLanguage("   \n\t")).toBe("plaintext");
    expect(detectLanguage("just some notes about the weekend")).toBe("plaintext");
  });

  it("applies the rules in priority order", () => {
    // Script markers beat the type annotation.
    expect(detectLanguage("const size = (value: number) => value * 2")).toBe("javascript");
    // Blade interpolation beats markup.
    expect(detectLanguage("<p>{{ $title }}</p>")).toBe("php");
    // An arrow token keeps markup from matching.
    expect(detectLanguage("<T>(value) => value</T>")).toBe("typescript");
    // Arrays win over the stylesheet rule.
    expect(detectLanguage('[{"a": "b;"}]')).toBe("json");
  });

  it("matches query keywords regardless of case", () => {
    expect(detectLanguage("select id from accounts")).toBe("sql");
    expect(detectLanguage("create table accounts (id int)")).toBe("sql");
  });

  it("only treats quoted-module imports as non-python", () => {
    expect(detectLanguage("import os\nprint(os.name)")).toBe("python");
    expect(detectLanguage("class Point:\n    pass")).toBe("python");
  });

  it("recognizes framework markers", () => {
    expect(detectLanguage("<button className=\"primary\">Go</button>")).toBe("javascript");
    expect(detectLanguage("namespace App\\Http;")).toBe("php");
    expect(detectLanguage("@extends('layouts.app')")).toBe("php");
    expect(detectLanguage("<!DOCTYPE html>")).toBe("html");
  });
});

describe("language options", () => {
  it("labels every option and falls back for unknown keys", () => {
    expect(getLanguageLabel("php")).toBe("PHP / Laravel (Blade)");
    expect(getLanguageLabel("plaintext")).toBe("Plain Text");
    expect(LANGUAGE_OPTIONS.map((option) => option.value)).toContain("sql");
  });

  it("validates language keys", () => {
    expect(isLanguageKey("python")).toBe(true);
    expect(isLanguageKey("rust")).toBe(false);
  });
});

describe("shouldAutoDetectLanguage", () => {
  it("requires more than twenty characters", () => {
    expect(shouldAutoDetectLanguage("x".repeat(20))).toBe(false);
    expect(shouldAutoDetectLanguage("x".repeat(21))).toBe(true);
  });
});
