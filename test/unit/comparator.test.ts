import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { compareLines, createComparator, normalizedPath } from "../../src/comparator.ts";
import type { Line } from "../../src/types.ts";

const kept = (text: string): Line => ({ kind: "kept", text });
const removed: Line = { kind: "removed" };

describe("comparator", () => {
  describe("normalizedPath", () => {
    it("drops whitespace and everything before the first quote", () => {
      assert.equal(normalizedPath('\tlog "platform/logging" // x'), '"platform/logging"//x');
    });

    it("keeps the stripped text when there is no quote", () => {
      assert.equal(normalizedPath("\t// a comment"), "//acomment");
    });
  });

  describe("compareLines", () => {
    it("treats two removed lines as equal", () => {
      assert.equal(compareLines(removed, removed), 0);
    });

    it("sorts removed lines after everything else", () => {
      assert.equal(compareLines(removed, kept("// comment")), 1);
      assert.equal(compareLines(kept('"fmt"'), removed), -1);
    });

    it("orders by group rank first", () => {
      assert.ok(compareLines(kept('"zlib"'), kept('"platform/a"')) < 0);
      assert.ok(compareLines(kept('"platform/z"'), kept('"github.com/a"')) < 0);
      assert.ok(compareLines(kept('"github.com/z"'), kept("// a")) < 0);
      assert.ok(compareLines(kept("// a"), kept('"fmt"')) > 0);
    });

    it("orders by path within a group", () => {
      assert.equal(compareLines(kept('\t"os"'), kept('\t"fmt"')), 1);
      assert.equal(compareLines(kept('\t"fmt"'), kept('\t"os"')), -1);
    });

    it("ignores aliases when comparing paths", () => {
      assert.equal(compareLines(kept('\tz "fmt"'), kept('\ta "os"')), -1);
    });

    it("treats identical paths as equal", () => {
      assert.equal(compareLines(kept('"fmt"'), kept('  "fmt"')), 0);
    });

    it("compares comment lines by their text", () => {
      assert.equal(compareLines(kept("// b"), kept("// a")), 1);
    });
  });

  describe("createComparator", () => {
    it("sorts a mixed list into groups with removed lines last", () => {
      const lines = [
        kept("// note"),
        removed,
        kept('"github.com/x/y"'),
        kept('"os"'),
        kept('"platform/z"'),
        kept('"fmt"'),
      ];

      const sorted = lines.sort(createComparator());

      assert.deepEqual(sorted, [
        kept('"fmt"'),
        kept('"os"'),
        kept('"platform/z"'),
        kept('"github.com/x/y"'),
        kept("// note"),
        removed,
      ]);
    });

    it("uses the given groups", () => {
      const sorted = [kept('"corp.example/a"'), kept('"fmt"')].sort(
        createComparator({ platform: [], thirdParty: ["corp.example/"] }),
      );
      assert.deepEqual(sorted, [kept('"fmt"'), kept('"corp.example/a"')]);
    });
  });
});
