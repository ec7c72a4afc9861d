export interface ThemeColors {
  background: string;
  water: string;
  /** Parks, forests and other green areas; one color is picked per feature. */
  landuse: string[];
  /** Outline of water, landuse and building polygons. */
  contours: string;
  streets: string;
  /** Line color, then an optional color for the dashes drawn on top. */
  rails: string[];
  buildings: string[];
  text: string;
  waterlines: string;
  textshadow?: string;
}

export type FontFace = 'plain' | 'bold' | 'italic' | 'bold.italic';

export interface ThemeFont {
  family: string;
  face: FontFace;
  scale: number;
}

export interface BorderSizes {
  contours: number;
  water: number;
  canal: number;
  river: number;
}

export interface StreetSizes {
  path: number;
  residential: number;
  structure: number;
  tertiary: number;
  secondary: number;
  primary: number;
  motorway: number;
  rails: number;
  runway: number;
}

export type StreetClass = keyof StreetSizes;

export interface ThemeSize {
  borders: BorderSizes;
  streets: StreetSizes;
}

export interface Theme {
  name: string;
  colors: ThemeColors;
  font: ThemeFont;
  size: ThemeSize;
}

export type BorderShape = 'none' | 'circle' | 'square' | 'rhombus' | 'hexagon' | 'octagon' | 'decagon';

export const BORDER_SHAPES: readonly BorderShape[] = ['none', 'circle', 'square', 'rhombus', 'hexagon', 'octagon', 'decagon'];
