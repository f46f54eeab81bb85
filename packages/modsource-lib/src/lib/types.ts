export type Result<T> = { data: T } | { error: string };
