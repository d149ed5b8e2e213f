import type { RoArray, IsNatural, SumUpTo } from "@bitreg/const-utils";
import { isNatural, assertNatural } from "@bitreg/utils";

export const storagePreferences = ["fast", "small"] as const;
export type StoragePreference = typeof storagePreferences[number];

//widest storage the default selector (and the type-level arithmetic) supports
export const maxBitwidth = 64;
export type MaxBitwidth = typeof maxBitwidth;

export type Bitwidths = RoArray<number>;

//Overflow if the sum exceeds MaxBitwidth, number if the widths aren't known at compile time
export type TotalBitwidth<W extends Bitwidths> = SumUpTo<W, MaxBitwidth>;

export interface Layout<
  P extends StoragePreference = StoragePreference,
  W extends Bitwidths = Bitwidths,
> {
  readonly preference: P;
  //field i occupies the bits directly above those of field i - 1, field 0 the lowest ones
  readonly fieldWidths: W;
  readonly totalBitwidth: TotalBitwidth<W>;
}

//what every layout is assignable to, whatever its widths
//TotalBitwidth makes Layout invariant in W, so functions taking layouts constrain on this instead
export interface AnyLayout {
  readonly preference: StoragePreference;
  readonly fieldWidths: Bitwidths;
  readonly totalBitwidth: number;
}

export const invalidBitwidth = "layout fields must be non-negative integer bit widths";
export type InvalidBitwidth = typeof invalidBitwidth;

//widths that are only known at run time (i.e. `number`) are checked by `layout` instead
export type CheckBitwidths<W extends Bitwidths> =
  W extends readonly [infer Head extends number, ...infer Tail extends Bitwidths]
  ? number extends Head
    ? CheckBitwidths<Tail>
    : IsNatural<Head> extends true
    ? CheckBitwidths<Tail>
    : InvalidBitwidth
  : unknown;

export const isBitwidth = (value: unknown): value is number => isNatural(value);

export const sumBitwidths = (fieldWidths: Bitwidths): number =>
  fieldWidths.reduce((acc, width) => acc + width, 0);

//offset of each field, i.e. the sum of the widths of all fields preceding it
export const fieldOffsets = (fieldWidths: Bitwidths): number[] => {
  const offsets: number[] = [];
  let offset = 0;
  for (const width of fieldWidths) {
    offsets.push(offset);
    offset += width;
  }
  return offsets;
};

export function assertBitwidths(fieldWidths: Bitwidths) {
  fieldWidths.forEach((width, i) => assertNatural(width, `Bit width of field ${i}`));
}

export function layout<const P extends StoragePreference, const W extends Bitwidths>(
  preference: P,
  fieldWidths: W & CheckBitwidths<W>,
): Layout<P, W> {
  if (!storagePreferences.includes(preference))
    throw new Error(`Invalid storage preference: ${String(preference)}`);

  assertBitwidths(fieldWidths);
  return {
    preference,
    fieldWidths,
    totalBitwidth: sumBitwidths(fieldWidths) as TotalBitwidth<W>,
  };
}

export const fastLayout = <const W extends Bitwidths>(
  fieldWidths: W & CheckBitwidths<W>,
): Layout<"fast", W> => layout<"fast", W>("fast", fieldWidths);

export const smallLayout = <const W extends Bitwidths>(
  fieldWidths: W & CheckBitwidths<W>,
): Layout<"small", W> => layout<"small", W>("small", fieldWidths);
