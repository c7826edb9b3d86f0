import { collectUpload, UploadPart } from './upload-parts';

const filePart = (filename: string) => {
  const toBuffer = jest.fn().mockResolvedValue(Buffer.from(filename));
  const resume = jest.fn();
  const part: UploadPart = {
    type: 'file',
    filename,
    mimetype: 'audio/mpeg',
    toBuffer,
    file: { resume },
  };
  return { part, toBuffer, resume };
};

async function* streamOf(parts: UploadPart[]): AsyncGenerator<UploadPart> {
  for (const part of parts) {
    yield part;
  }
}

describe('collectUpload', () => {
  it('buffers files up to the limit and drains the rest', async () => {
    const first = filePart('a.mp3');
    const second = filePart('b.mp3');
    const third = filePart('c.mp3');

    const upload = await collectUpload(streamOf([first.part, second.part, third.part]), 2);

    expect(upload.files.map((file) => file.filename)).toEqual(['a.mp3', 'b.mp3']);
    expect(upload.files[0].buffer.toString()).toBe('a.mp3');
    expect(upload.overflow).toEqual(['c.mp3']);
    expect(third.toBuffer).not.toHaveBeenCalled();
    expect(third.resume).toHaveBeenCalledTimes(1);
    expect(first.resume).not.toHaveBeenCalled();
  });

  it('reads the keyterms field and ignores other fields', async () => {
    const upload = await collectUpload(
      streamOf([
        { type: 'field', fieldname: 'note', value: 'ignored' },
        { type: 'field', fieldname: 'keyterms', value: 'NDA, Plaintiff Doe' },
        filePart('a.wav').part,
      ]),
      5,
    );

    expect(upload.keyterms).toBe('NDA, Plaintiff Doe');
    expect(upload.files).toHaveLength(1);
    expect(upload.overflow).toEqual([]);
  });
});
