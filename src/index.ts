export { cityview, effectiveRadius, isBorderShape, DEFAULT_RADIUS, type CityviewOptions } from './cityview';
export {
  computeExportDimensions,
  exportPoster,
  findPaperSize,
  mmToPixels,
  scaleTextSizes,
  validateFormat,
  EXPORT_FORMATS,
  PAPER_SIZES,
  PAPER_SIZE_NAMES,
  type DimensionOptions,
  type ExportDimensions,
  type ExportFormat,
  type ExportOptions,
  type ExportResult,
  type Orientation,
  type PaperSize,
} from './export';
export { CityViewError, isCityViewError, type CityViewErrorCode } from './lib/errors';
export { ProgressTracker } from './lib/progress';
export { customTheme, getTheme, isColor, listThemes, themeFromImage, themeFromPalette, type ThemeName } from './lib/themes';
export { BORDER_SHAPES, type BorderShape, type Theme, type ThemeColors, type ThemeFont, type ThemeSize } from './lib/types';
export { getVibrant, type VibrantColors } from './lib/vibrant';
export { drawPoster, renderPoster, registerFonts, type CityView, type RenderOptions, type TextSizes } from './render/poster-canvas';
export { CityCatalog, cityCatalog } from './services/city-catalog';
export { getCity, newCity, randomCity, resolveConflicts, formatCityChoice, DEFAULT_MIN_POPULATION } from './services/city-resolver';
export type { CatalogCity, CityChooser, CityInput, CityRecord } from './services/city-types';
export { MapDataService, mapDataService, LAYER_NAMES, type LayerName, type MapData, type MapDataSource, type MapLayers } from './services/map-data';
export { FileCache } from './db';
export { lookupCity, boundingBox } from './utils';
