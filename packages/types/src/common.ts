/**
 * @module common
 * Common primitive types used across all packages.
 */

/**
 * Axis-aligned rectangle in edge form.
 * `right` and `bottom` are exclusive; width and height are always derived.
 */
export interface Bounds {
  /** Left edge X coordinate */
  left: number;
  /** Top edge Y coordinate */
  top: number;
  /** Right edge X coordinate (exclusive) */
  right: number;
  /** Bottom edge Y coordinate (exclusive) */
  bottom: number;
}

/** 2D point in document space. */
export interface Point {
  /** X coordinate */
  x: number;
  /** Y coordinate */
  y: number;
}

/** Colour modes the decoder accepts, named as Krita's `colorspacename`. */
export type ColorMode = 'RGBA' | 'RGBA16';

/**
 * Krita composite-op identifiers (the `compositeop` attribute).
 * @see https://invent.kde.org/graphics/krita/-/blob/master/libs/pigment/KoCompositeOpRegistry.h
 */
export enum KritaBlendMode {
  PassThrough = 'pass through',
  Normal = 'normal',
  Dissolve = 'dissolve',
  Behind = 'behind',
  Erase = 'erase',
  Darken = 'darken',
  Multiply = 'multiply',
  ColorBurn = 'burn',
  LinearBurn = 'linear_burn',
  DarkerColor = 'darker color',
  Lighten = 'lighten',
  Screen = 'screen',
  ColorDodge = 'dodge',
  LinearDodge = 'linear_dodge',
  LighterColor = 'lighter color',
  Overlay = 'overlay',
  SoftLight = 'soft_light',
  HardLight = 'hard_light',
  VividLight = 'vivid_light',
  LinearLight = 'linear light',
  PinLight = 'pin_light',
  HardMix = 'hard mix',
  Difference = 'diff',
  Exclusion = 'exclusion',
  Subtract = 'subtract',
  Divide = 'divide',
  Hue = 'hue',
  Saturation = 'saturation',
  Color = 'color',
  Luminosity = 'luminize',
}
