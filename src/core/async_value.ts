export type AsyncLoading = { readonly status: "loading" };
export type AsyncData<T> = { readonly status: "data"; readonly value: T | undefined };
export type AsyncError = {
  readonly status: "error";
  readonly error: unknown;
  readonly stack: string | undefined;
};

/** State of an asynchronous producer. The producer decides the transitions. */
export type AsyncValue<T> = AsyncLoading | AsyncData<T> | AsyncError;

// 共用同一個 Loading，連續寫入 Loading 會被 Object.is 去重
const LOADING: AsyncLoading = Object.freeze({ status: "loading" });

export function loading(): AsyncLoading {
  return LOADING;
}

export function data<T>(value: T | undefined): AsyncData<T> {
  return { status: "data", value };
}

/** Data with no payload yet: "not fetched". */
export function initial<T>(): AsyncData<T> {
  return data<T>(undefined);
}

export function error(err: unknown, stack?: string): AsyncError {
  return { status: "error", error: err, stack: stack ?? stackOf(err) };
}

function stackOf(err: unknown) {
  if (err instanceof Error && err.stack) return err.stack;
  return new Error().stack;
}

export const isLoading = <T>(v: AsyncValue<T>): v is AsyncLoading => v.status === "loading";
export const isData = <T>(v: AsyncValue<T>): v is AsyncData<T> => v.status === "data";
export const isError = <T>(v: AsyncValue<T>): v is AsyncError => v.status === "error";

export type AsyncHandlers<T, R> = {
  loading: () => R;
  data: (value: T | undefined) => R;
  error: (error: unknown, stack: string | undefined) => R;
};

export function match<T, R>(v: AsyncValue<T>, handlers: AsyncHandlers<T, R>): R {
  switch (v.status) {
    case "loading":
      return handlers.loading();
    case "data":
      return handlers.data(v.value);
    case "error":
      return handlers.error(v.error, v.stack);
  }
}

export const AsyncValue = { loading, data, initial, error, isLoading, isData, isError, match };
