import { describe, expect, it } from "vitest";
import {
  applyRepairs,
  closeUnterminatedStructure,
  normalizeSingleQuotes,
  stripTrailingCommas
} from "../parser/repairs.js";
import { extractBraceSpans, extractFencedBlocks } from "../parser/spans.js";

describe("json repairs", () => {
  it("rewrites single-quoted strings as double-quoted ones", () => {
    expect(normalizeSingleQuotes("{'tool': 'read_file', 'parameters': {'file_path': 'a.txt'}}")).toBe(
      '{"tool": "read_file", "parameters": {"file_path": "a.txt"}}'
    );
    expect(normalizeSingleQuotes("{'text': 'say \"hi\"'}")).toBe('{"text": "say \\"hi\\""}');
    expect(normalizeSingleQuotes("{'text': 'it\\'s'}")).toBe('{"text": "it\'s"}');
  });

  it("leaves apostrophes inside double-quoted strings alone", () => {
    const text = '{"text": "it\'s fine"}';
    expect(normalizeSingleQuotes(text)).toBe(text);
  });

  it("drops trailing commas outside strings only", () => {
    expect(stripTrailingCommas('{"a": [1, 2,], "b": 3,}')).toBe('{"a": [1, 2], "b": 3}');
    expect(stripTrailingCommas('{"a": [1,\n  ]\n}')).toBe('{"a": [1\n  ]\n}');
    const quoted = '{"a": "x,}"}';
    expect(stripTrailingCommas(quoted)).toBe(quoted);
  });

  it("closes exactly one open structure", () => {
    expect(closeUnterminatedStructure('{"tool": "list_directory", "parameters": {}')).toBe(
      '{"tool": "list_directory", "parameters": {}}'
    );
    expect(closeUnterminatedStructure('{"tool": "a", "parameters": {"x": [1, 2')).toBe(
      '{"tool": "a", "parameters": {"x": [1, 2]'
    );
    expect(closeUnterminatedStructure("{}")).toBe("{}");
  });

  it("closes a dangling string before the structure", () => {
    expect(closeUnterminatedStructure('{"note": "unfinished')).toBe('{"note": "unfinished"}');
  });

  it("reports only the repairs that changed the text", () => {
    expect(applyRepairs("{'tool': 'x',}")).toEqual({
      text: '{"tool": "x"}',
      applied: ["normalizeSingleQuotes", "stripTrailingCommas"]
    });
    expect(applyRepairs('{"tool": "x"}')).toEqual({ text: '{"tool": "x"}', applied: [] });
  });
});

describe("span extraction", () => {
  it("finds fenced blocks with offsets and language tags", () => {
    const text = 'before\n```json\n{"a":1}\n```\nafter';
    const blocks = extractFencedBlocks(text);

    expect(blocks).toEqual([
      {
        start: 7,
        end: 26,
        contentStart: 15,
        content: '{"a":1}\n',
        language: "json",
        terminated: true
      }
    ]);
    expect(text.slice(26)).toBe("\nafter");
  });

  it("runs an unclosed last fence to the end of the text", () => {
    const blocks = extractFencedBlocks('```\n{"a":1');
    expect(blocks).toHaveLength(1);
    expect(blocks[0]?.content).toBe('{"a":1');
    expect(blocks[0]?.language).toBe("");
    expect(blocks[0]?.terminated).toBe(false);
    expect(blocks[0]?.end).toBe(10);
  });

  it("only opens and closes fences at the start of a line", () => {
    expect(extractFencedBlocks('say ```json {"a":1}``` inline')).toEqual([]);

    const blocks = extractFencedBlocks('  ```\n{"s": "x ``` y"}\n  ```');
    expect(blocks).toHaveLength(1);
    expect(blocks[0]?.start).toBe(2);
    expect(blocks[0]?.content).toBe('{"s": "x ``` y"}\n');
    expect(blocks[0]?.terminated).toBe(true);
  });

  it("finds outermost brace spans and ignores apostrophes in prose", () => {
    const spans = extractBraceSpans(`I'll call {"tool": "x"} now`);
    expect(spans).toEqual([{ start: 10, end: 23, text: '{"tool": "x"}', terminated: true }]);
  });

  it("keeps braces inside strings from closing a span", () => {
    const spans = extractBraceSpans('{"a": {"b": "}"}} tail {"c": 1');
    expect(spans.map((span) => span.text)).toEqual(['{"a": {"b": "}"}}', '{"c": 1']);
    expect(spans.map((span) => span.terminated)).toEqual([true, false]);
  });
});
