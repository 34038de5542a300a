// src/decoders/multipart.decoder.ts
/**
 * Purpose:
 * - `multipart/form-data` body decoder on busboy, with file parts held in
 *   memory (multer's memoryStorage model).
 *
 * Tags:
 * - `multipart: "name"`: the text part `name` (one value, or a list when it
 *   repeats), else the file part(s) named `name`.
 * - `multipart: ",allfiles"`: every file part, on a list<file> field.
 *
 * Invariants:
 * - Records only; fields without a `multipart` tag are left alone.
 * - A file beyond `maxFileSize`, or more than `maxFiles` files, fails the
 *   decode; the rest of the body is drained.
 */

import busboy from "busboy";
import type { Readable } from "node:stream";
import { labelOf } from "../coerce/CoercionError";
import { classifyDestination } from "../dsl/record";
import { UploadedFile } from "../dsl/upload";
import { headerValue, type BindRequest } from "../request/BindRequest";
import { assignField } from "./assign";
import type { BodyDecoder, DecodeTarget } from "./BodyDecoder";

export const CONTENT_TYPE_MULTIPART = "multipart/form-data";
export const TAG_MULTIPART = "multipart";
export const ALL_FILES = ",allfiles";

/** Per-file limit when none is configured: 32 MiB. */
export const DEFAULT_MAX_FILE_SIZE = 32 << 20;

export type MultipartDecoderOptions = {
  maxFileSize?: number;
  maxFiles?: number;
};

type MultipartPayload = {
  fields: Map<string, string[]>;
  files: UploadedFile[];
};

export class MultipartDecoder implements BodyDecoder {
  public readonly contentType = CONTENT_TYPE_MULTIPART;

  private readonly maxFileSize: number;
  private readonly maxFiles?: number;

  constructor(opts: MultipartDecoderOptions = {}) {
    this.maxFileSize = opts.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFiles = opts.maxFiles;
  }

  public async decode(req: BindRequest, target: DecodeTarget): Promise<void> {
    const { value, fields } = target;
    if (classifyDestination(value) !== "record") {
      throw new Error(
        `cannot decode multipart body into ${labelOf(value)}, only into a record`
      );
    }

    const payload = await this.parse(req);

    for (const [name, def] of Object.entries(fields)) {
      const key = def.tags[TAG_MULTIPART];
      if (key === undefined) continue;

      if (key === ALL_FILES) {
        if (payload.files.length) {
          assignField(value, name, def.type, payload.files);
        }
        continue;
      }

      const texts = payload.fields.get(key);
      if (texts) {
        const raw = texts.length === 1 ? texts[0] : texts;
        assignField(value, name, def.type, raw);
        continue;
      }

      const parts = payload.files.filter((file) => file.fieldName === key);
      if (!parts.length) continue;
      assignField(
        value,
        name,
        def.type,
        def.type.kind === "list" ? parts : parts[0]
      );
    }
  }

  private parse(req: BindRequest): Promise<MultipartPayload> {
    const payload: MultipartPayload = { fields: new Map(), files: [] };
    const body = req.body;
    if (body === null) return Promise.resolve(payload);

    const contentType = headerValue(req, "content-type") ?? "";
    const parser = busboy({
      headers: { ...req.headers, "content-type": contentType },
      limits: { fileSize: this.maxFileSize, files: this.maxFiles },
    });

    return new Promise((resolve, reject) => {
      let failed = false;
      const fail = (err: unknown): void => {
        if (failed) return;
        failed = true;
        body.unpipe(parser);
        body.resume();
        reject(err instanceof Error ? err : new Error(String(err)));
      };

      parser.on("field", (name, text) => {
        const values = payload.fields.get(name);
        if (values) values.push(text);
        else payload.fields.set(name, [text]);
      });

      parser.on("file", (name, stream: Readable, info) => {
        const chunks: Buffer[] = [];
        stream.on("data", (chunk: Buffer) => chunks.push(chunk));
        stream.on("limit", () =>
          fail(new Error(`file "${name}" exceeds ${this.maxFileSize} bytes`))
        );
        stream.on("end", () => {
          if (failed) return;
          payload.files.push(
            new UploadedFile({
              fieldName: name,
              fileName: info.filename,
              encoding: info.encoding,
              mimeType: info.mimeType,
              buffer: Buffer.concat(chunks),
            })
          );
        });
      });

      parser.on("filesLimit", () =>
        fail(new Error(`more than ${this.maxFiles} files`))
      );
      parser.on("error", fail);
      parser.on("close", () => {
        if (!failed) resolve(payload);
      });

      body.pipe(parser);
    });
  }
}
