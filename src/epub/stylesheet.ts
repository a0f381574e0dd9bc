// pattern: Functional Core

/**
 * Theme CSS plus a body font-size rule when the profile scales text.
 */
export function buildStylesheet(themeCss: string, fontSizeAdjust: number): string {
  if (fontSizeAdjust === 1) {
    return themeCss;
  }
  const percent = Math.round(fontSizeAdjust * 100);
  return `${themeCss.trimEnd()}\n\nbody {\n  font-size: ${percent}%;\n}\n`;
}
