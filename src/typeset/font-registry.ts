/**
 * Font registration with the canvas font manager.
 *
 * Registered faces live for the life of the process, so a face that is
 * already known under its name is not an error: rendering proceeds with the
 * registered face.
 */

import { GlobalFonts } from '@napi-rs/canvas';
import { FontRegistrationError } from '../errors/index.js';

const registered = new Map<string, string>();

export type RegistrationOutcome = 'registered' | 'already-registered';

export function registerFontFace(fontPath: string, fontName: string): RegistrationOutcome {
  if (registered.has(fontName)) return 'already-registered';

  let loaded: boolean;
  try {
    loaded = GlobalFonts.registerFromPath(fontPath, fontName);
  } catch (err) {
    throw new FontRegistrationError(
      `Could not register font "${fontName}" from ${fontPath}: ${(err as Error).message}`,
      { fontPath, fontName }
    );
  }
  if (!loaded) {
    throw new FontRegistrationError(
      `Could not register font "${fontName}" from ${fontPath}: not a readable font file`,
      { fontPath, fontName }
    );
  }
  registered.set(fontName, fontPath);
  return 'registered';
}

export function isFontRegistered(fontName: string): boolean {
  return registered.has(fontName);
}
