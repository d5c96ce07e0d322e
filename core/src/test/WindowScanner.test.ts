import { strict as assert } from "assert";
import { describe, it, afterEach } from "mocha";
import path from "path";
import { WindowScanner, codePointLength, digestBlock } from "../WindowScanner.js";
import { splitLines } from "../normalize.js";
import { makeTree, removeTree } from "./fixtures.js";

describe("digestBlock", () => {
  it("returns the SHA-1 hex digest of the joined text", () => {
    assert.equal(digestBlock("abc"), "a9993e364706816aba3e25717850c26c9cd0d89d");
  });

  it("is equal for equal content", () => {
    assert.equal(digestBlock("a\nb"), digestBlock("a\nb"));
    assert.notEqual(digestBlock("a\nb"), digestBlock("b\na"));
  });
});

describe("WindowScanner.scanLines", () => {
  it("skips every window that contains an empty normalized line", () => {
    const scanner = new WindowScanner({ window: 2, minChars: 0 });

    const hits = scanner.scanLines(["a", "b", "   ", "c", "d"]);

    assert.deepEqual(hits, [
      { digest: digestBlock("a\nb"), startLine: 1 },
      { digest: digestBlock("c\nd"), startLine: 4 },
    ]);
  });

  it("excludes windows containing a comment-only line", () => {
    const scanner = new WindowScanner({ window: 2, minChars: 0 });

    assert.deepEqual(scanner.scanLines(["x = 1;", "// note", "y = 2;"]), []);
  });

  it("counts the line separators toward minChars", () => {
    const rawLines = ["a b", "c d"];

    assert.equal(new WindowScanner({ window: 2, minChars: 5 }).scanLines(rawLines).length, 1);
    assert.equal(new WindowScanner({ window: 2, minChars: 6 }).scanLines(rawLines).length, 0);
  });

  it("measures minChars in code points", () => {
    assert.equal(codePointLength("a\u{1F600}"), 2);
    assert.deepEqual(new WindowScanner({ window: 1, minChars: 3 }).scanLines(["\u{1F600}\u{1F600}"]), []);
    assert.deepEqual(new WindowScanner({ window: 1, minChars: 2 }).scanLines(["\u{1F600}\u{1F600}"]), [
      { digest: digestBlock("\u{1F600}\u{1F600}"), startLine: 1 },
    ]);
  });

  it("numbers lines after form feeds and Unicode line separators", () => {
    const scanner = new WindowScanner({ window: 1, minChars: 0 });

    const hits = scanner.scanLines(splitLines("one();\ftwo();\u2028three();"));

    assert.deepEqual(
      hits.map((hit) => hit.startLine),
      [1, 2, 3]
    );
  });

  it("emits one window per start line with 1-based numbering", () => {
    const scanner = new WindowScanner({ window: 3, minChars: 0 });

    const hits = scanner.scanLines(["l1", "l2", "l3", "l4", "l5"]);

    assert.deepEqual(
      hits.map((hit) => hit.startLine),
      [1, 2, 3]
    );
    assert.equal(hits[2].digest, digestBlock("l3\nl4\nl5"));
  });

  it("returns nothing when the file is shorter than the window", () => {
    const scanner = new WindowScanner({ window: 4, minChars: 0 });

    assert.deepEqual(scanner.scanLines(["a", "b", "c"]), []);
  });

  it("handles a window of one line", () => {
    const scanner = new WindowScanner({ window: 1, minChars: 0 });

    assert.deepEqual(scanner.scanLines(["x", ""]), [{ digest: digestBlock("x"), startLine: 1 }]);
  });
});

describe("WindowScanner.scanFile", () => {
  let root: string | null = null;

  afterEach(async () => {
    await removeTree(root);
    root = null;
  });

  it("reads CRLF files the same as LF files", async () => {
    root = await makeTree({
      "lf.ts": "one();\ntwo();\n",
      "crlf.ts": "one();\r\ntwo();\r\n",
    });
    const scanner = new WindowScanner({ window: 2, minChars: 0 });

    const lf = await scanner.scanFile(path.join(root, "lf.ts"));
    const crlf = await scanner.scanFile(path.join(root, "crlf.ts"));

    assert.deepEqual(lf, [{ digest: digestBlock("one();\ntwo();"), startLine: 1 }]);
    assert.deepEqual(crlf, lf);
  });

  it("treats an unreadable file as having no windows", async () => {
    root = await makeTree({});
    const scanner = new WindowScanner({ window: 1, minChars: 0 });

    assert.deepEqual(await scanner.scanFile(path.join(root, "missing.ts")), []);
    assert.deepEqual(await scanner.scanFile(root), []);
  });
});
