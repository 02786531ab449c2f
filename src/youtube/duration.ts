const ISO_DURATION = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

/** `PT1H2M10S` → 3730. Anything unparseable counts as 0. */
export function parseIsoDuration(value: string | undefined): number {
  const match = ISO_DURATION.exec(value ?? "");
  if (!match) return 0;
  const [, days, hours, minutes, seconds] = match;
  return (
    Number(days ?? 0) * 86400 +
    Number(hours ?? 0) * 3600 +
    Number(minutes ?? 0) * 60 +
    Math.floor(Number(seconds ?? 0))
  );
}
