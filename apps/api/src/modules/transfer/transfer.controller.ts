import { BadRequestException, Body, Controller, Post, Query, Req, Res } from '@nestjs/common';
import { ApiConsumes, ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { exportBodySchema, importQuerySchema } from '@wellgrid/shared';
import type { ExportBodyInput, ImportQueryInput, PlateDataset } from '@wellgrid/shared';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import { LayoutService } from '../layout/layout.service';
import { TableReaderService } from './table-reader.service';
import { TableWriterService } from './table-writer.service';
import { toNormalizeHints } from './import-hints';

@ApiTags('transfer')
@Controller('api/layout')
export class TransferController {
  constructor(
    private readonly layoutService: LayoutService,
    private readonly reader: TableReaderService,
    private readonly writer: TableWriterService,
  ) {}

  @Post('import')
  @ApiOperation({
    summary: 'Import a plate layout file',
    description: 'Uploads a CSV, TSV, TXT or XLSX file and normalizes it to position/value records.',
  })
  @ApiConsumes('multipart/form-data')
  @ApiQuery({ name: 'plateSize', required: false, description: 'Wells per plate (default from DEFAULT_PLATE_SIZE)' })
  @ApiQuery({ name: 'positionFormat', required: false, description: 'Target notation' })
  @ApiQuery({ name: 'positionColumn', required: false })
  @ApiQuery({ name: 'rowColumn', required: false, description: 'Row and column fields, e.g. "plate_row,plate_column"' })
  @ApiQuery({ name: 'rowIsNumeric', required: false, description: 'true or false; inferred when omitted' })
  @ApiQuery({ name: 'valueColumn', required: false })
  @ApiQuery({ name: 'plateColumn', required: false })
  @ApiQuery({ name: 'sheet', required: false, description: 'XLSX sheet, 1-based index or name' })
  @ApiResponse({ status: 201, description: 'Normalized dataset' })
  @ApiResponse({ status: 400, description: 'No file or unsupported file type' })
  async importFile(
    @Req() request: FastifyRequest,
    @Query(new ZodValidationPipe(importQuerySchema)) query: ImportQueryInput,
  ): Promise<PlateDataset & { fileName: string }> {
    const file = await request.file();
    if (!file) {
      throw new BadRequestException('No file provided');
    }

    const buffer = await file.toBuffer();
    const table = await this.reader.read(buffer, file.filename, query.sheet);
    const dataset = this.layoutService.normalize(table, toNormalizeHints(query));
    return { fileName: file.filename, ...dataset };
  }

  @Post('export')
  @ApiOperation({
    summary: 'Export records',
    description: 'Serializes a record table to CSV, TSV or XLSX, optionally adding plate_row / plate_column.',
  })
  @ApiResponse({ status: 200, description: 'File download' })
  async exportFile(
    @Body(new ZodValidationPipe(exportBodySchema)) body: ExportBodyInput,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const file = await this.writer.write(body);
    reply
      .status(200)
      .header('Content-Type', file.contentType)
      .header('Content-Disposition', `attachment; filename="${file.fileName}"`)
      .header('Content-Length', file.buffer.length)
      .send(file.buffer);
  }
}
