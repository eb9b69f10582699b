import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  convertPosition,
  createPlateMap,
  detectPositionFormat,
  getPlateDimensions,
  listPlateGeometries,
  normalizePlateData,
  requireColumnFormat,
} from '@wellgrid/shared';
import type {
  CellValue,
  ConvertBodyInput,
  DetectedFormat,
  NormalizeHints,
  PlateDataset,
  PlateGeometry,
  PlateMap,
  PlateMapBodyInput,
  PlateSize,
  PositionFormat,
  PositionValue,
  RawTable,
} from '@wellgrid/shared';
import type { EnvConfig } from '../../config/env.config';

export interface ConversionResult {
  plateSize: PlateSize;
  from: PositionFormat;
  to: PositionFormat;
  positions: PositionValue[];
}

@Injectable()
export class LayoutService {
  private readonly logger = new Logger(LayoutService.name);

  constructor(private readonly config: ConfigService<EnvConfig, true>) {}

  private get defaultPlateSize(): PlateSize {
    return this.config.get('DEFAULT_PLATE_SIZE', { infer: true });
  }

  /** Every supported plate with its row labels */
  listPlates(): PlateGeometry[] {
    return listPlateGeometries();
  }

  detect(sample: CellValue): { sample: CellValue; format: DetectedFormat } {
    return { sample, format: detectPositionFormat(sample) };
  }

  /** Convert a batch; the source notation is detected from the first position when not given */
  convert(body: ConvertBodyInput): ConversionResult {
    const plateSize = body.plateSize ?? this.defaultPlateSize;
    const geometry = getPlateDimensions(plateSize);
    const from = body.from ?? requireColumnFormat(body.positions, 'positions');
    const positions = body.positions.map((p) => convertPosition(p, from, body.to, geometry));

    this.logger.log(`Converted ${positions.length} positions ${from} → ${body.to} on a ${plateSize}-well plate`);
    return { plateSize, from, to: body.to, positions };
  }

  normalize(table: RawTable, hints: NormalizeHints): PlateDataset {
    const dataset = normalizePlateData(table, {
      ...hints,
      plateSize: hints.plateSize ?? this.defaultPlateSize,
    });

    const { resolution } = dataset;
    this.logger.log(
      `Normalized ${dataset.records.length} rows (position: ${resolution.positionStrategy}, ` +
        `value: ${resolution.valueColumn} via ${resolution.valueStrategy}, ` +
        `${dataset.sourceFormat ?? 'empty'} → ${dataset.positionFormat})`,
    );
    return dataset;
  }

  plateMap(body: PlateMapBodyInput): PlateMap {
    return createPlateMap(body);
  }
}
