/** Masks every run of 3+ digits, keeping the last `visible` digits of each run. */
export function maskDigits(input: string, visible: number = 2): string {
  return input.replace(/\d{3,}/g, (match) => {
    const keep = match.slice(-visible);
    return "*".repeat(Math.max(0, match.length - visible)) + keep;
  });
}

export function maskSecret(value?: string): string {
  if (!value) return "missing";
  if (value.length <= 4) return "*".repeat(value.length);
  return "*".repeat(value.length - 4) + value.slice(-4);
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

export function clip(text: string, maxLen: number): string {
  return text.length > maxLen ? `${text.slice(0, maxLen)}...(truncated)` : text;
}
