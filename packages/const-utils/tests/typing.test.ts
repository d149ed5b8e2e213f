import type { Equal, Opts, RoArray } from "../src/typing.js";
import type { Brand, Unbrand, ExtractTags } from "../src/branding.js";

type Assert<T extends true> = T;

// ============================================================================
// Equal
// ============================================================================

type _Equal1 = Assert<Equal<8, 8>>;
type _Equal2 = Assert<Equal<8, number> extends false ? true : false>;
type _Equal3 = Assert<Equal<number | 8, number>>;
type _Equal4 = Assert<Equal<readonly [8], [8]> extends false ? true : false>;

// ============================================================================
// Misc
// ============================================================================

type _RoArray1 = Assert<Equal<RoArray<number>, readonly number[]>>;
type _RoArray2 = Assert<[8, 9] extends RoArray<number> ? true : false>;
type _Opts1    = Assert<Equal<Opts<{ a: number }>, { readonly a?: number | undefined }>>;

// ============================================================================
// Branding
// ============================================================================

type Bitwidth = Brand<number, "Bitwidth">;
type Narrow   = Brand<Bitwidth, "Narrow">;

type _Brand1 = Assert<Equal<Unbrand<Narrow>, number>>;
type _Brand2 = Assert<Equal<ExtractTags<Narrow>, "Bitwidth" | "Narrow">>;
type _Brand3 = Assert<Equal<ExtractTags<number>, never>>;
type _Brand4 = Assert<Narrow extends Bitwidth ? true : false>;
type _Brand5 = Assert<Bitwidth extends Narrow ? false : true>;
type _Brand6 = Assert<Equal<Brand<number, "">, number>>;
