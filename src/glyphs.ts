// Nerd Font code points
export const GLYPHS = {
  alert: "\u{F0026}",
  timer: "\u{F051B}",
  harddisk: "\u{F02CA}",
  memory: "\u{F035B}",
  cpu: "\u{F4BC}",
  earth: "\u{F01E7}",
  network: "\u{F06F3}",
  networkOff: "\u{F0C9B}",
  arrowDown: "\u{EA9D}",
  arrowUp: "\u{EAA0}",
} as const;

export const ICON_SPACER = " ";

export function withIcon(icon: string, text: string): string {
  return `${icon}${ICON_SPACER}${text}`;
}
