const units = [
  { label: "day", ms: 86_400_000 },
  { label: "hour", ms: 3_600_000 },
  { label: "minute", ms: 60_000 },
  { label: "second", ms: 1_000 },
] as const;

/**
 * Human readable distance between two epoch-millisecond timestamps.
 * Before the first clock tick `now` is 0 and nothing is shown.
 */
export const formatTimeAgo = (now: number, then: number): string => {
  if (now === 0) return "";
  const elapsed = now - then;
  for (const unit of units) {
    const count = Math.floor(elapsed / unit.ms);
    if (count >= 1) {
      return `${count} ${unit.label}${count === 1 ? "" : "s"} ago`;
    }
  }
  return "just now";
};
