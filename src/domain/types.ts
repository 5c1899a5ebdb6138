export const PDF_INPUT_KINDS = ['raw', 'base64', 'url'] as const;

export type PdfInputKind = (typeof PDF_INPUT_KINDS)[number];

export type PdfInput =
  | { kind: 'raw'; bytes: Uint8Array }
  | { kind: 'base64'; text: string }
  | { kind: 'url'; url: string };

export interface ResolvedPdf {
  path: string;
  sizeBytes: number;
  source: PdfInputKind;
}

export interface PageImage {
  pageNumber: number;
  data: Buffer;
}

export interface ConversionResult {
  archive: Buffer;
  pageCount: number;
  entryNames: string[];
}

export interface HandlerResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
  isBase64Encoded: boolean;
}

export interface InvocationContext {
  awsRequestId?: string;
}
