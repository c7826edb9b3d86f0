import { Controller, Get, StreamableFile } from '@nestjs/common';
import { ExportsService } from './exports.service';
import { CurrentSession } from '../../common/decorators/current-session.decorator';
import { DiscoverySession } from '../../database/entities';

const attachment = (filename: string) => `attachment; filename="${filename}"`;

@Controller('exports')
export class ExportsController {
  constructor(private readonly exportsService: ExportsService) {}

  /**
   * GET /api/exports/txt
   */
  @Get('txt')
  exportText(@CurrentSession() session: DiscoverySession): StreamableFile {
    const text = this.exportsService.buildText(this.exportsService.requireResults(session));
    return new StreamableFile(Buffer.from(text, 'utf-8'), {
      type: 'text/plain; charset=utf-8',
      disposition: attachment('transcripts.txt'),
    });
  }

  /**
   * GET /api/exports/json
   */
  @Get('json')
  exportJson(@CurrentSession() session: DiscoverySession): StreamableFile {
    const json = this.exportsService.buildJson(this.exportsService.requireResults(session));
    return new StreamableFile(Buffer.from(json, 'utf-8'), {
      type: 'application/json; charset=utf-8',
      disposition: attachment('discovery_report.json'),
    });
  }

  /**
   * GET /api/exports/pdf
   */
  @Get('pdf')
  async exportPdf(@CurrentSession() session: DiscoverySession): Promise<StreamableFile> {
    const pdf = await this.exportsService.buildPdf(this.exportsService.requireResults(session));
    return new StreamableFile(pdf, {
      type: 'application/pdf',
      disposition: attachment('discovery_report.pdf'),
    });
  }
}
