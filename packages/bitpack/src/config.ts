//whether `set` checks that values fit their field, unless overridden per record type
//off in production, where oversized values are silently truncated instead
export const defaultDebugAssertions = process.env["NODE_ENV"] !== "production";
