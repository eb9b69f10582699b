import { Controller, Get, Post, Body, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { LayoutService } from './layout.service';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import {
  convertBodySchema,
  detectBodySchema,
  normalizeBodySchema,
  plateMapBodySchema,
} from '@wellgrid/shared';
import type {
  ConvertBodyInput,
  DetectBodyInput,
  NormalizeBodyInput,
  PlateMapBodyInput,
} from '@wellgrid/shared';

@ApiTags('layout')
@Controller('api/layout')
export class LayoutController {
  constructor(private readonly layoutService: LayoutService) {}

  @Get('plates')
  @ApiOperation({ summary: 'List plate sizes', description: 'Rows, columns and row labels of every supported plate.' })
  @ApiResponse({ status: 200, description: 'Array of plate geometries' })
  listPlates() {
    return this.layoutService.listPlates();
  }

  @Post('detect')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Detect position notation', description: 'Classifies one sample as letter_number, sequential, row_column or unknown.' })
  detect(@Body(new ZodValidationPipe(detectBodySchema)) body: DetectBodyInput) {
    return this.layoutService.detect(body.sample);
  }

  @Post('convert')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Convert positions', description: 'Converts a batch of positions between notations. Fails on the first invalid position.' })
  @ApiResponse({ status: 422, description: 'Invalid or out-of-bounds position' })
  convert(@Body(new ZodValidationPipe(convertBodySchema)) body: ConvertBodyInput) {
    return this.layoutService.convert(body);
  }

  @Post('normalize')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Normalize a table', description: 'Finds position and value columns and returns one record per row in the target notation.' })
  @ApiResponse({ status: 422, description: 'Column not found or position not convertible' })
  normalize(@Body(new ZodValidationPipe(normalizeBodySchema)) body: NormalizeBodyInput) {
    return this.layoutService.normalize(body.table, body.hints);
  }

  @Post('plate-map')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Generate a plate map', description: 'Enumerates wells from a start position in reading order.' })
  @ApiResponse({ status: 422, description: 'Invalid start position' })
  plateMap(@Body(new ZodValidationPipe(plateMapBodySchema)) body: PlateMapBodyInput) {
    return this.layoutService.plateMap(body);
  }
}
