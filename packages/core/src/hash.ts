/**
 * Simple config hashing for reproducibility tracking.
 * FNV-1a over the key-sorted JSON.
 */

export function hashConfig(config: object): string {
  const json = JSON.stringify(config, Object.keys(config).sort());
  let hash = 0x811c9dc5;
  for (let i = 0; i < json.length; i++) {
    hash ^= json.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0).toString(16).padStart(8, "0");
}
