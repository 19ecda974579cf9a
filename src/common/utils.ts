/**
 * Source of uniformly distributed numbers in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Source of the current wall-clock time
 */
export type Clock = () => Date;

/**
 * Pick a uniformly random integer in [0, max)
 */
export function randomInt(max: number, random: RandomSource = Math.random): number {
  // Clamp so a source returning exactly 1 cannot escape the range
  return Math.min(max - 1, Math.floor(random() * max));
}

/**
 * Validate if a string is a valid address (IP or hostname)
 */
export function isValidAddress(address: string): boolean {
  // IPv4 pattern
  const ipv4Pattern = /^(\d{1,3}\.){3}\d{1,3}$/;
  // Basic hostname pattern
  const hostnamePattern = /^[a-zA-Z0-9.-]+$/;

  if (ipv4Pattern.test(address)) {
    // Validate IPv4 ranges
    const parts = address.split('.').map(Number);
    return parts.every(part => part >= 0 && part <= 255);
  }

  return hostnamePattern.test(address) && address.length > 0;
}
