export function delayMs(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, Math.max(0, Math.floor(ms))));
}
