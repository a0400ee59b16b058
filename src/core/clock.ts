export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** `2024-05-01T12:00:00Z`: the timestamp format every persisted document uses. */
export const isoSeconds = (date: Date): string =>
  date.toISOString().replace(/\.\d{3}Z$/, "Z");

/** `20240501T120000Z`: used in identifiers and archive names. */
export const compactStamp = (date: Date): string =>
  isoSeconds(date).replace(/[-:]/g, "");

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
