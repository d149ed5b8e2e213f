// This file implements a hierarchical branding system for TypeScript types.
//
// Branding allows you to create distinct types from a base type by attaching tags, to get around
//   issues that stem from TypeScript using structural typing (duck-typing) where
//   `type Bits = number;` and `type Bytes = number;` are considered equivalent, leading to
//   accidental mixing of values that share the same underlying type but represent different
//   concepts.
//
// # Hierarchical Tag Accumulation
//
// Tags accumulate hierarchically. When you brand a type that's already branded, the new tag is
//   added to the existing set of tags rather than replacing them:
//
// ```
// type Bitwidth = Brand<number, "Bitwidth">;
// type Overflow = Brand<Bitwidth, "Overflow">; // Overflow has both "Bitwidth" and "Overflow"
// ```
//
// A branded type remains assignable to its base type (and to its less specific brands), but not
//   the other way around, so a `Brand<number, "Overflow">` can flow wherever a number is
//   expected while still being distinguishable from any number literal in conditional types.

declare const __brand: unique symbol;
export type Branded<Base, Tags extends string> = {
  [__brand]: { base: Base; tags: { [K in Tags]: never } }
};

export type ExtractTags<T> =
  T extends { [__brand]: { tags: infer Tags } } ? keyof Tags & string : never;

export type Unbrand<T> = T extends { [__brand]: { base: infer B } } ? B : T;

export type Brand<T, B extends string> =
  Exclude<B, ""> extends never //convenience fall-through
  ? T
  : Unbrand<T> & Branded<Unbrand<T>, ExtractTags<T> | Exclude<B, "">>;
