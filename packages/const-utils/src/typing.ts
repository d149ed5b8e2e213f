export type RoArray<T = unknown> = readonly T[];

export type Opts<T> = { readonly [K in keyof T]?: T[K] | undefined };

//exact type equality, i.e. neither side merely being assignable to the other
//see here: https://github.com/microsoft/TypeScript/issues/27024#issuecomment-421529650
export type Equal<T, U> =
  (<X>() => X extends T ? 1 : 2) extends (<X>() => X extends U ? 1 : 2) ? true : false;
