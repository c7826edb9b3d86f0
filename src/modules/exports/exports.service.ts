import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import PDFDocument from 'pdfkit';
import { DiscoverySession, TranscriptionResult } from '../../database/entities';
import { ErrorCode } from '../../common/interfaces/response.interface';
import { TranscriptsService } from '../transcripts/transcripts.service';

/**
 * 标准 PDF 字体只支持 Latin-1，其余字符替换为 ?
 */
export function toLatin1(value: string): string {
  return value.replace(/[^\u0000-\u00ff]/gu, '?');
}

@Injectable()
export class ExportsService {
  private readonly logger = new Logger(ExportsService.name);

  constructor(private transcriptsService: TranscriptsService) {}

  /**
   * 获取可导出的结果，会话中没有结果时报 404
   */
  requireResults(session: DiscoverySession): TranscriptionResult[] {
    if (session.results.length === 0) {
      throw new NotFoundException({
        code: ErrorCode.NOT_FOUND,
        message: 'No processed results in this session',
      });
    }
    return session.results;
  }

  buildText(results: readonly TranscriptionResult[]): string {
    return results.map((result) => `--- ${result.filename} ---\n${result.text}`).join('\n\n');
  }

  buildJson(results: readonly TranscriptionResult[]): string {
    return JSON.stringify(results, null, 2);
  }

  /**
   * 生成 PDF 报告
   * 每个文件一页：实体统计 + 完整转录文本
   */
  async buildPdf(results: readonly TranscriptionResult[]): Promise<Buffer> {
    const doc = new PDFDocument({
      autoFirstPage: false,
      margin: 50,
      info: { Title: 'Discovery Report' },
    });

    const chunks: Buffer[] = [];
    const done = new Promise<Buffer>((resolve, reject) => {
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);
    });

    for (const result of results) {
      doc.addPage();
      doc.font('Helvetica-Bold').fontSize(16).text(toLatin1(`Transcript Report: ${result.filename}`));
      doc.moveDown(0.5);

      doc.font('Helvetica-Bold').fontSize(12).text('Summary of Entities:');
      doc.font('Helvetica').fontSize(11);
      for (const { type, count } of this.transcriptsService.summarizeEntities(result.entities)) {
        doc.text(toLatin1(`- ${type}: ${count}`));
      }
      doc.moveDown(0.5);

      doc.font('Helvetica-Bold').fontSize(12).text('Full Transcript:');
      doc.font('Helvetica').fontSize(10).text(toLatin1(result.text), { lineGap: 2 });
    }

    doc.end();

    const pdf = await done;
    this.logger.log(`Generated PDF report: ${results.length} transcripts, ${pdf.length} bytes`);
    return pdf;
  }
}
