/**
 * Returns the first rendered frame matching the predicate, or the last frame
 * once `timeout` passes. Searches every frame rather than `lastFrame()`,
 * since a component that calls `useApp().exit()` may unmount before the
 * next tick.
 */
export async function waitForFrame(
  frames: readonly string[],
  predicate: (frame: string) => boolean,
  timeout = 2000,
): Promise<string> {
  const start = Date.now()
  while (Date.now() - start < timeout) {
    const match = frames.find(predicate)
    if (match) return match
    await new Promise((r) => setTimeout(r, 10))
  }
  return frames[frames.length - 1] ?? ""
}
