import { AudioFile } from '../../providers/elevenlabs/elevenlabs.service';

/**
 * multipart 分段的最小结构，@fastify/multipart 的 Multipart 可直接传入
 */
export type UploadPart =
  | {
      type: 'file';
      filename: string;
      mimetype: string;
      toBuffer(): Promise<Buffer>;
      file: { resume(): unknown };
    }
  | {
      type: 'field';
      fieldname: string;
      value: unknown;
    };

export interface CollectedUpload {
  files: AudioFile[];
  overflow: string[]; // 超出单批上限的文件名，内容未读入内存
  keyterms?: string;
}

/**
 * 读取上传分段
 * 只缓冲前 maxFiles 个文件，其余文件流直接丢弃，仅保留文件名
 */
export async function collectUpload(
  parts: AsyncIterable<UploadPart>,
  maxFiles: number,
): Promise<CollectedUpload> {
  const upload: CollectedUpload = { files: [], overflow: [] };

  for await (const part of parts) {
    if (part.type === 'file') {
      if (upload.files.length < maxFiles) {
        upload.files.push({
          filename: part.filename,
          mimetype: part.mimetype,
          buffer: await part.toBuffer(),
        });
      } else {
        part.file.resume();
        upload.overflow.push(part.filename);
      }
    } else if (part.fieldname === 'keyterms' && typeof part.value === 'string') {
      upload.keyterms = part.value;
    }
  }

  return upload;
}
