/**
 * Shared wire primitives. Amounts travel as decimal strings so values past
 * 2^53 survive JSON.
 */

import { Type, type Static } from "@sinclair/typebox";

export const AddressV1 = Type.String({ pattern: "^0x[0-9a-fA-F]{40}$" });
export type AddressV1 = Static<typeof AddressV1>;

export const AmountV1 = Type.String({ pattern: "^[0-9]{1,78}$" });
export type AmountV1 = Static<typeof AmountV1>;

export const Count = Type.Integer({ minimum: 0 });
