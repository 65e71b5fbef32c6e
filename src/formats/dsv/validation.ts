/**
 * DSV validation
 */

import { type } from "arktype";
import { DSVParseError } from "../../errors";
import { MAX_FIELD_SIZE } from "./constants";

/**
 * @throws {DSVParseError} If the field exceeds the maximum size
 */
export function validateFieldSize(field: string, lineNumber?: number, maxSize: number = MAX_FIELD_SIZE): void {
  if (field.length > maxSize) {
    throw new DSVParseError(
      `Field size ${field.length} exceeds maximum ${maxSize}`,
      lineNumber,
      undefined,
      `${field.slice(0, 50)}...`
    );
  }
}

const SingleCharacter = type("string == 1");

/**
 * ArkType validation schema for DSV parser options
 */
export const DSVParserOptionsSchema = type({
  "delimiter?": SingleCharacter,
  "quote?": SingleCharacter,
  "maxFieldLines?": "number.integer>0",
  "compression?": "'auto' | 'gzip' | 'none'",
  "signal?": "unknown",
  "onWarning?": "Function",
}).narrow((options, ctx) => {
  if (options.quote !== undefined && options.quote === (options.delimiter ?? ",")) {
    return ctx.reject({
      path: ["quote"],
      expected: "a quote character different from the delimiter",
      actual: JSON.stringify(options.quote),
    });
  }
  return true;
});

/**
 * ArkType validation schema for DSV writer options
 */
export const DSVWriterOptionsSchema = type({
  "delimiter?": SingleCharacter,
  "quote?": SingleCharacter,
  "lineEnding?": type.enumerated("\n", "\r\n"),
  "flushEvery?": "number.integer>0",
});
