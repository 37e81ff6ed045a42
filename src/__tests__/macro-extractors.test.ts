import { describe, it, expect } from "vitest";
import {
  codeBodyFromMacroMarkup,
  decodeEntities,
  filenameFromImageMarkup,
  languageFromMacroMarkup,
  macroParameter,
} from "../macro-extractors.js";

describe("decodeEntities", () => {
  it("decodes the XML entities and nbsp", () => {
    expect(decodeEntities("a &lt;b&gt; &amp; &quot;c&quot; &apos;d&apos;&nbsp;e")).toBe(`a <b> & "c" 'd'\u00a0e`);
  });

  it("decodes decimal and hex references", () => {
    expect(decodeEntities("&#65;&#x42;&#X43;")).toBe("ABC");
  });

  it("leaves unknown names and out-of-range code points alone", () => {
    expect(decodeEntities("&copy; &#x110000;")).toBe("&copy; &#x110000;");
  });
});

describe("filenameFromImageMarkup", () => {
  it("reads the first ri:filename attribute", () => {
    const markup = `<ac:image><ri:attachment ri:filename="chart.png"></ri:attachment></ac:image>`;
    expect(filenameFromImageMarkup(markup)).toBe("chart.png");
  });

  it("returns an empty string without a filename", () => {
    expect(filenameFromImageMarkup("<ac:image></ac:image>")).toBe("");
  });
});

describe("macroParameter", () => {
  const markup = [
    `<ac:structured-macro ac:name="code">`,
    `<ac:parameter ac:name="title">Example</ac:parameter>`,
    `<ac:parameter ac:name="language">python</ac:parameter>`,
    `</ac:structured-macro>`,
  ].join("");

  it("finds a parameter by name", () => {
    expect(macroParameter(markup, "title")).toBe("Example");
    expect(languageFromMacroMarkup(markup)).toBe("python");
  });

  it("returns an empty string for a missing parameter", () => {
    expect(macroParameter(markup, "theme")).toBe("");
  });
});

describe("codeBodyFromMacroMarkup", () => {
  it("strips a raw CDATA wrapper and decodes entities", () => {
    const markup = `<ac:plain-text-body><![CDATA[if (a &lt; b) {}]]></ac:plain-text-body>`;
    expect(codeBodyFromMacroMarkup(markup)).toBe("if (a < b) {}");
  });

  it("strips CDATA that a parser turned into a comment", () => {
    const markup = `<ac:plain-text-body>&lt;!--[CDATA[x = 1]]--&gt;</ac:plain-text-body>`;
    expect(codeBodyFromMacroMarkup(markup)).toBe("x = 1");
  });

  it("returns an empty string without a body", () => {
    expect(codeBodyFromMacroMarkup(`<ac:structured-macro ac:name="code"></ac:structured-macro>`)).toBe("");
  });
});
