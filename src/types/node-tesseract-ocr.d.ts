// node-tesseract-ocr ships no type declarations and has no @types package.
declare module 'node-tesseract-ocr' {
  export interface Config {
    lang?: string;
    oem?: number;
    psm?: number;
    binary?: string;
    presets?: string[];
    [key: string]: unknown;
  }

  export function recognize(input: string | string[] | Buffer, config?: Config): Promise<string>;
}
