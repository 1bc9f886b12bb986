export type Option<T> = { kind: "some"; value: T } | { kind: "none" };

export const none: Option<never> = { kind: "none" };

export function some<T>(value: T): Option<T> {
  return { kind: "some", value };
}
