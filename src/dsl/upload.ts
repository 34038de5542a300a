// src/dsl/upload.ts
/**
 * Purpose:
 * - One file part of a multipart body, held in memory (the shape of multer's
 *   memoryStorage file, camel-cased).
 */

export type UploadedFileInit = {
  fieldName: string;
  fileName: string;
  encoding: string;
  mimeType: string;
  buffer: Buffer;
};

export class UploadedFile {
  public readonly fieldName: string;
  public readonly fileName: string;
  public readonly encoding: string;
  public readonly mimeType: string;
  public readonly buffer: Buffer;

  constructor(init: UploadedFileInit) {
    this.fieldName = init.fieldName;
    this.fileName = init.fileName;
    this.encoding = init.encoding;
    this.mimeType = init.mimeType;
    this.buffer = init.buffer;
  }

  public get size(): number {
    return this.buffer.length;
  }

  public text(encoding: BufferEncoding = "utf8"): string {
    return this.buffer.toString(encoding);
  }
}
