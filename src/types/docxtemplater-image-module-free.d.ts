declare module 'docxtemplater-image-module-free' {
  import type { DXT } from 'docxtemplater';

  interface ImageModuleOptions {
    centered?: boolean;
    fileType?: 'docx' | 'pptx';
    getImage(tagValue: unknown, tagName: string): Buffer | Uint8Array | string;
    getSize(image: Buffer, tagValue: unknown, tagName: string): [number, number];
  }

  const ImageModule: new (options: ImageModuleOptions) => DXT.Module;
  export = ImageModule;
}
