/**
 * Round half away from zero to the given number of decimals
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}
