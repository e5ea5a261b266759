/**
 * Data-parallel loop seam. Each iteration must write only its own output
 * slot, so the iterations may run in any order. Runs on the calling thread.
 */
export function parallelFor(count: number, body: (i: number) => void): void {
  for (let i = 0; i < count; i++) body(i);
}
