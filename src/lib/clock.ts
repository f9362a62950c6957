// UTC "now" as an ISO-8601 string. Stamps UpdatedAt locally and issues watermarks on the server.
export interface Clock {
  now(): string;
}

export const systemClock: Clock = {
  now: () => new Date().toISOString(),
};
