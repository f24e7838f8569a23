import { describe, expect, test } from "vitest";
import { decodeText } from "../../src/io/file-reader";

function utf16le(text: string, bom: boolean): Uint8Array {
  const body = Buffer.from(text, "utf16le");
  return bom ? Buffer.concat([Buffer.from([0xff, 0xfe]), body]) : body;
}

describe("decodeText", () => {
  test("decodes UTF-8 with and without a BOM", () => {
    const text = "Sequence\tRT [min]\nSIINFEKL\t12.5\n";

    expect(decodeText(Buffer.from(text, "utf8"))).toBe(text);
    expect(decodeText(Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from(text)]))).toBe(text);
  });

  test("decodes UTF-16LE by BOM", () => {
    expect(decodeText(utf16le("Sequence\nSIINFEKL\n", true))).toBe("Sequence\nSIINFEKL\n");
  });

  test("decodes UTF-16BE by BOM", () => {
    const bytes = Uint8Array.from([0xfe, 0xff, 0x00, 0x48, 0x00, 0x4c, 0x00, 0x41]);

    expect(decodeText(bytes)).toBe("HLA");
  });

  test("falls back to UTF-16LE when the bytes are not UTF-8", () => {
    // "é" in UTF-16LE is E9 00, which is invalid UTF-8
    expect(decodeText(utf16le("é", false))).toBe("é");
  });
});
