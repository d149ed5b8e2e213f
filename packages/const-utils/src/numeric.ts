import type { RoArray } from "./typing.js";
import type { Brand } from "./branding.js";

//Type-level arithmetic on natural number literals.
//
//Everything here is built on tuple lengths, so it is only meant for small numbers (bit widths,
//  byte sizes, etc.). TypeScript gives up after roughly 1000 levels of (tail) recursion.

//only plain decimal digits qualify, which rules out negatives, fractions and exponent notation
export type IsNatural<N extends number> =
  number extends N
  ? false
  : `${N}` extends `${bigint}`
  ? `${N}` extends `-${string}` ? false : true
  : false;

export type TupleWithLength<T, L extends number> =
  IsNatural<L> extends true ? TupleWithLengthImpl<T, L, []> : T[];

type TupleWithLengthImpl<T, L extends number, Acc extends T[]> =
  Acc["length"] extends L ? Acc : TupleWithLengthImpl<T, L, [...Acc, T]>;

//union of all naturals from 0 up to and including N
export type Range<N extends number> =
  IsNatural<N> extends true ? RangeImpl<N, []> : number;

type RangeImpl<N extends number, Acc extends number[]> =
  Acc["length"] extends N ? Acc[number] | N : RangeImpl<N, [...Acc, Acc["length"]]>;

//boolean if either side is not known at compile time
export type LessEqual<A extends number, B extends number> =
  IsNatural<A> extends true
  ? IsNatural<B> extends true
    ? [A] extends [Range<B>] ? true : false
    : boolean
  : boolean;

//result of SumUpTo when the sum exceeds its bound
//branding keeps it assignable to number while distinguishing it from every number literal
export type Overflow = Brand<number, "Overflow">;

//sum of a tuple of natural literals, provided it doesn't exceed Max
//yields number if the summands aren't all known at compile time
export type SumUpTo<T extends RoArray<number>, Max extends number> =
  number extends T["length"] ? number : SumUpToImpl<T, Max, []>;

type SumUpToImpl<T extends RoArray<number>, Max extends number, Acc extends unknown[]> =
  T extends readonly [infer Head extends number, ...infer Tail extends RoArray<number>]
  ? IsNatural<Head> extends false
    ? number
    : LessEqual<Head, Max> extends false
    ? Overflow
    : TupleWithLength<unknown, Head> extends infer Pad extends unknown[]
    ? [...Acc, ...Pad] extends infer Next extends unknown[]
      ? LessEqual<Next["length"], Max> extends true
        ? SumUpToImpl<Tail, Max, Next>
        : Overflow
      : never
    : never
  : Acc["length"];

//parses the decimal representation of a number-like literal (including numeric enum members)
//  back into the corresponding number literal
export type ToNumber<N extends number> =
  `${N}` extends `${infer R extends number}` ? R : never;
