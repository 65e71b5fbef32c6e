/**
 * DSV parser and writer tests
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { CompressionError, DSVParseError, ValidationError } from "../../src/errors";
import {
  DSVParser,
  DSVWriter,
  removeBOM,
  splitRow,
  TSVParser,
  TSVWriter,
  zipHeader,
} from "../../src/formats/dsv";
import { readFile, writeFile } from "node:fs/promises";
import { collect, makeTempDir, readText, type TempDir, textStream, writeGzipText } from "../utils/fixtures";

describe("splitRow", () => {
  test("splits plain fields", () => {
    expect(splitRow("a\tb\tc", "\t")).toEqual({ fields: ["a", "b", "c"], complete: true });
  });

  test("keeps delimiters inside quotes and unescapes doubled quotes", () => {
    expect(splitRow('a\t"b\tc"\t"say ""hi"""', "\t").fields).toEqual(["a", "b\tc", 'say "hi"']);
  });

  test("treats quotes inside an unquoted field literally", () => {
    expect(splitRow('5\'UTR"x\ty', "\t").fields).toEqual(['5\'UTR"x', "y"]);
  });

  test("keeps text after a closing quote", () => {
    expect(splitRow('"ab"cd\te', "\t").fields).toEqual(["abcd", "e"]);
  });

  test("a trailing delimiter adds an empty field", () => {
    expect(splitRow("a\t", "\t").fields).toEqual(["a", ""]);
    expect(splitRow("\t", "\t").fields).toEqual(["", ""]);
  });

  test("an empty line has no fields", () => {
    expect(splitRow("", "\t").fields).toEqual([]);
  });

  test("reports a row that ends inside quotes as incomplete", () => {
    expect(splitRow('a\t"open', "\t")).toEqual({ fields: ["a"], complete: false });
  });
});

describe("utils", () => {
  test("removeBOM strips only a leading byte order mark", () => {
    expect(removeBOM("\uFEFFVariationID")).toBe("VariationID");
    expect(removeBOM("VariationID")).toBe("VariationID");
  });

  test("zipHeader leaves missing columns undefined and returns surplus fields", () => {
    expect(zipHeader(["a", "b", "c"], ["1"])).toEqual({
      values: { a: "1", b: undefined, c: undefined },
      extra: [],
    });
    expect(zipHeader(["a"], ["1", "2", "3"])).toEqual({ values: { a: "1" }, extra: ["2", "3"] });
  });

  test("zipHeader lets later duplicate columns win", () => {
    expect(zipHeader(["a", "a"], ["1", "2"]).values).toEqual({ a: "2" });
  });
});

describe("DSVParser", () => {
  test("keys rows by header and keeps a leading # in the first column name", async () => {
    const records = await collect(new TSVParser().parse(textStream("#AlleleID\tVariationID\n1\t10\n")));
    expect(records).toEqual([{ lineNumber: 2, values: { "#AlleleID": "1", VariationID: "10" }, extra: [] }]);
  });

  test("skips blank lines without counting them as rows", async () => {
    const records = await collect(new TSVParser().parse(textStream("a\tb\n\n1\t2\n\n")));
    expect(records).toHaveLength(1);
    expect(records[0]?.lineNumber).toBe(3);
  });

  test("strips a BOM from the header", async () => {
    const records = await collect(new TSVParser().parse(textStream("\uFEFFVariationID\tAssembly\n10\tGRCh38\n")));
    expect(records[0]?.values).toEqual({ VariationID: "10", Assembly: "GRCh38" });
  });

  test("joins quoted fields that span lines", async () => {
    const records = await collect(new TSVParser().parse(textStream('a\tb\n"x\ny"\t2\n3\t4\n')));
    expect(records.map((record) => record.values)).toEqual([
      { a: "x\ny", b: "2" },
      { a: "3", b: "4" },
    ]);
    expect(records.map((record) => record.lineNumber)).toEqual([2, 4]);
  });

  test("fails on a quote that never closes", async () => {
    await expect(collect(new TSVParser().parse(textStream('a\n"x\n')))).rejects.toThrow(DSVParseError);
  });

  test("limits how many lines a quoted field may span", async () => {
    const parser = new TSVParser({ maxFieldLines: 2 });
    await expect(collect(parser.parse(textStream('a\n"x\ny\nz"\n')))).rejects.toThrow(
      /exceeds maximum line limit \(2\)/
    );
  });

  test("DSVParser splits on commas by default", async () => {
    const records = await collect(new DSVParser().parse(textStream('id,name\n1,"a,b"\n')));
    expect(records[0]?.values).toEqual({ id: "1", name: "a,b" });
  });

  test("rejects a quote equal to the delimiter", () => {
    expect(() => new DSVParser({ delimiter: "\t", quote: "\t" })).toThrow(ValidationError);
  });

  test("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const parser = new TSVParser({ signal: controller.signal });
    await expect(collect(parser.parse(textStream("a\n1\n")))).rejects.toThrow(/aborted/);
  });

  describe("parseFile", () => {
    let dir: TempDir;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await dir.cleanup();
    });

    test("reads gzip by magic bytes regardless of extension", async () => {
      const path = await writeGzipText(dir.path("summary.dat"), "a\tb\n1\t2\n");
      const records = await collect(new TSVParser().parseFile(path));
      expect(records.map((record) => record.values)).toEqual([{ a: "1", b: "2" }]);
    });

    test("reads plain text named .gz", async () => {
      const path = dir.path("summary.txt.gz");
      await writeFile(path, "a\tb\n1\t2\n");
      const records = await collect(new TSVParser().parseFile(path));
      expect(records.map((record) => record.values)).toEqual([{ a: "1", b: "2" }]);
    });

    test("fails on a truncated gzip file", async () => {
      const body = "a\tb\n" + "1\t2\n".repeat(5000);
      const path = await writeGzipText(dir.path("whole.gz"), body);
      const bytes = await readFile(path);
      await writeFile(dir.path("cut.gz"), bytes.subarray(0, Math.floor(bytes.length / 2)));

      await expect(collect(new TSVParser().parseFile(dir.path("cut.gz")))).rejects.toThrow(
        /gzip/
      );
    });

    test("hands its abort signal to the decompressor", async () => {
      const path = await writeGzipText(dir.path("summary.txt.gz"), "a\tb\n1\t2\n");
      const controller = new AbortController();
      controller.abort();

      const parser = new TSVParser({ signal: controller.signal });
      const result = collect(parser.parseFile(path));
      await expect(result).rejects.toThrow(CompressionError);
      await expect(result).rejects.toThrow("Decompression aborted");
    });

    test("honours a forced compression format", async () => {
      const path = await writeGzipText(dir.path("summary.txt.gz"), "a\tb\n1\t2\n");
      const parser = new TSVParser({ compression: "gzip" });
      const records = await collect(parser.parseFile(path));
      expect(records.map((record) => record.values)).toEqual([{ a: "1", b: "2" }]);
    });
  });
});

describe("DSVWriter", () => {
  test("quotes only fields that need it", () => {
    const writer = new TSVWriter();
    expect(writer.formatRow(["plain", "has\ttab", 'has"quote', "line\nbreak", 7, null])).toBe(
      'plain\t"has\ttab"\t"has""quote"\t"line\nbreak"\t7\t'
    );
  });

  test("formatRows ends every row with the line ending", () => {
    expect(new DSVWriter({ lineEnding: "\r\n" }).formatRows(["a", "b"], [[1, 2]])).toBe("a,b\r\n1,2\r\n");
  });

  test("rejects invalid options", () => {
    expect(() => new DSVWriter({ flushEvery: 0 })).toThrow(ValidationError);
  });

  describe("writeFile", () => {
    let dir: TempDir;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await dir.cleanup();
    });

    test("writes the header when there are no rows", async () => {
      const path = dir.path("empty.tsv");
      expect(await new TSVWriter().writeFile(path, ["a", "b"], [])).toBe(0);
      expect(await readText(path)).toBe("a\tb\n");
    });

    test("flushes in batches without losing rows", async () => {
      const path = dir.path("rows.tsv");
      const rows = [[1], [2], [3], [4], [5]];
      expect(await new TSVWriter({ flushEvery: 2 }).writeFile(path, ["n"], rows)).toBe(5);
      expect(await readText(path)).toBe("n\n1\n2\n3\n4\n5\n");
    });

    test("round-trips through the parser", async () => {
      const path = dir.path("round.tsv");
      await new TSVWriter().writeFile(path, ["id", "note"], [["1", "tab\there"], ["2", 'quote"d']]);
      const records = await collect(new TSVParser().parseFile(path));
      expect(records.map((record) => record.values)).toEqual([
        { id: "1", note: "tab\there" },
        { id: "2", note: 'quote"d' },
      ]);
    });
  });
});
