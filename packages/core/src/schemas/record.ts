/**
 * Record positions.
 *
 * A stream record is `{"type": "name[@version]", "data": ...}`; the
 * orchestrator reads that envelope itself. What travels with a record into
 * the report is where it started in the source text.
 */

import { Type, type Static } from "@sinclair/typebox";

/** Position of a record in its source text (1-based). */
export const RecordLocation = Type.Object({
  line: Type.Integer({ minimum: 1 }),
  column: Type.Integer({ minimum: 1 }),
});

export type RecordLocation = Static<typeof RecordLocation>;
