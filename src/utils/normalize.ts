export const clamp = (value: number, minValue: number, maxValue: number): number =>
  Math.min(Math.max(value, minValue), maxValue);

export const mean = (values: number[], fallback: number): number => {
  if (!values.length) return fallback;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

export const uniqueStrings = (values: string[]): string[] => Array.from(new Set(values));

export const titleCase = (value: string): string =>
  value.replace(/\w\S*/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
