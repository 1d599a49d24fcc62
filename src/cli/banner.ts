/**
 * Program identity shown by --version and at the start of every dump
 */

export const NAME = "il2cpp-dump";
export const VERSION = "0.1.0";

export function bannerText(): string {
  return `${NAME} v${VERSION}`;
}
