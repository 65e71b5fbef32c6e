/**
 * Field-splitting state machine
 *
 * Splits one row on a delimiter with RFC 4180 quote handling. A quote only
 * opens a quoted field at the start of a field; elsewhere it is literal.
 * Characters after a closing quote are kept as part of the field.
 */

import { CSVParseState } from "./types";
import type { RowSplitResult } from "./types";

/**
 * Split a row into fields
 *
 * When the row ends inside a quoted field the result is marked incomplete
 * and the caller is expected to append the next physical line and retry.
 *
 * @example
 * ```typescript
 * splitRow('a\t"b\tc"\td', '\t').fields; // ['a', 'b\tc', 'd']
 * ```
 */
export function splitRow(line: string, delimiter: string = ",", quote: string = '"'): RowSplitResult {
  const fields: string[] = [];
  let currentField = "";
  let state = CSVParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    switch (state) {
      case CSVParseState.FIELD_START:
        if (char === quote) {
          state = CSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === quote) {
          state = CSVParseState.QUOTE_IN_QUOTED;
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else if (char === quote) {
          // doubled quote inside a quoted field
          currentField += quote;
          state = CSVParseState.QUOTED_FIELD;
        } else {
          currentField += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  switch (state) {
    case CSVParseState.QUOTED_FIELD:
      return { fields, complete: false };
    case CSVParseState.UNQUOTED_FIELD:
    case CSVParseState.QUOTE_IN_QUOTED:
      fields.push(currentField);
      break;
    case CSVParseState.FIELD_START:
      // only reachable with content after a trailing delimiter
      if (line.length > 0) fields.push("");
      break;
  }

  return { fields, complete: true };
}
