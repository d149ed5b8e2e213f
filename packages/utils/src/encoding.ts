import { base16 as b16 } from "@scure/base";

export const stripPrefix = (prefix: string, str: string): string =>
  str.startsWith(prefix) ? str.slice(prefix.length) : str;

export const hex = {
  //base16 of @scure/base only speaks uppercase, hence the case juggling in both directions
  decode: (input: string): Uint8Array =>
    b16.decode(stripPrefix("0x", input).toUpperCase()),

  encode: ((input: Uint8Array, prefix: boolean = false): string => {
    const result = b16.encode(input).toLowerCase();
    return prefix ? `0x${result}` : result;
  }) as {
    (input: Uint8Array, prefix: true): `0x${string}`;
    (input: Uint8Array, prefix?: boolean): string;
  },
};

export const bignum = {
  toString: ((input: bigint, prefix: boolean = false): string => {
    let str = input.toString(16);
    str = str.length % 2 === 1 ? "0" + str : str;
    return prefix ? "0x" + str : str;
  }) as {
    (input: bigint, prefix: true): `0x${string}`;
    (input: bigint, prefix?: boolean): string;
  },

  //big endian, left-padded with zeros to length if given
  toBytes: (input: bigint | number, length?: number): Uint8Array => {
    if (typeof input === "number")
      input = bignum.toBigInt(input);
    if (input < 0n)
      throw new Error(`Can't convert negative value ${input} to bytes`);
    const b = hex.decode(bignum.toString(input));
    if (length === undefined)
      return b;
    if (length < b.length)
      throw new Error(`Can't fit ${input} into ${length} bytes`);
    return bytes.zpad(b, length);
  },

  toNumber: (input: bigint): number => {
    if (input < BigInt(Number.MIN_SAFE_INTEGER) || BigInt(Number.MAX_SAFE_INTEGER) < input)
      throw new Error(`Invalid cast: ${input} out of safe integer range`);

    return Number(input);
  },

  toBigInt: (input: number): bigint => {
    if (!Number.isSafeInteger(input))
      throw new Error(`Invalid cast: ${input} out of safe integer range`);

    return BigInt(input);
  },
};

export const bytes = {
  zpad: (arr: Uint8Array, length: number, padStart: boolean = true): Uint8Array => {
    if (length === arr.length)
      return new Uint8Array(arr);

    if (length < arr.length)
      throw new Error(`Padded length must be >= input length`);

    const result = new Uint8Array(length);
    result.set(arr, padStart ? length - arr.length : 0);
    return result;
  },
};
