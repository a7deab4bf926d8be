export function interpretAnalysis(text: string): string {
  return text.trim();
}
