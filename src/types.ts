export type Cell = number | string | boolean | null;

export interface Column {
  name: string;
  values: Cell[];
}

export interface Dataset {
  id: string;
  name: string; // source file name, unique per session
  parserId: string;
  loadedAt: string;
  columns: Column[];
  rowCount: number;
}

export type DatasetMap = ReadonlyMap<string, Dataset>;

export interface UploadedFile {
  name: string;
  bytes: ArrayBuffer | Uint8Array;
}

// a file the browser could not read into memory
export interface UnreadableFile {
  name: string;
  readError: string;
}

export type Upload = UploadedFile | UnreadableFile;

export type PlotMode = 'line' | 'scatter';

export interface PlotSpec {
  source: string;
  xColumn: string;
  yColumn: string;
  mode: PlotMode;
  title: string; // derived, see computeTitle
}

export type PlotSpecField = 'source' | 'xColumn' | 'yColumn' | 'mode';

export type AxisType = 'linear' | 'date' | 'category';

export interface FigureTrace {
  name: string;
  x: (number | null)[];
  y: (number | null)[];
  mode: 'lines' | 'markers';
  color: string;
}

export interface FigureTheme {
  paper: string;
  plot: string;
  font: string;
  grid: string;
  zeroline: string;
}

export interface RenderedFigure {
  id: string;
  slot: number;
  title: string;
  xLabel: string;
  yLabel: string;
  axisType: AxisType;
  categories?: string[];
  traces: FigureTrace[];
  theme: FigureTheme;
  error?: string;
}

export type DiagnosticLevel = 'error' | 'warn' | 'info';

export type DiagnosticKind =
  | 'UnsupportedFileType'
  | 'DecodeFailure'
  | 'ParseWarning'
  | 'EmptyCatalog'
  | 'StaleColumnReference'
  | 'UnsupportedRenderMode'
  | 'InvalidPlotConfig'
  | 'RenderFailure'
  | 'Info';

export interface Diagnostic {
  level: DiagnosticLevel;
  kind: DiagnosticKind;
  subject: string; // file name or "Plot N"
  message: string;
}
