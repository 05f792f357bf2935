// src/reservation/services/train-catalog-loader.service.ts

import { Injectable, Logger } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import * as fs from 'fs';
import * as path from 'path';
import { TrainCatalogFormatError } from '../domain/reservation.errors';
import { TrainDefinition } from '../interfaces/reservation.interface';
import { parseTrainRecord } from '../utils/train-definition.parser';

/**
 * 车次目录加载器
 *
 * 第一行为表头，跳过；之后每行一个车次，空行忽略
 */
@Injectable()
export class TrainCatalogLoaderService {
  private readonly logger = new Logger(TrainCatalogLoaderService.name);

  loadFromFile(catalogPath: string): TrainDefinition[] {
    const resolved = path.resolve(process.cwd(), catalogPath);
    const content = fs.readFileSync(resolved, 'utf-8');
    const definitions = this.parseCatalog(content);
    this.logger.log(`Loaded ${definitions.length} trains from ${resolved}`);
    return definitions;
  }

  parseCatalog(content: string): TrainDefinition[] {
    const rows: unknown = parse(content, {
      from_line: 2,
      relax_column_count: true,
      trim: true,
    });
    if (!Array.isArray(rows)) {
      throw new TrainCatalogFormatError('Catalog did not parse into rows');
    }

    const definitions: TrainDefinition[] = [];
    const seen = new Set<string>();

    rows.forEach((row: unknown, index: number) => {
      // 表头占第 1 行
      const line = index + 2;
      if (!Array.isArray(row) || !row.every((field): field is string => typeof field === 'string')) {
        throw new TrainCatalogFormatError('Record is not a list of fields', line);
      }
      // 空行
      if (row.every(field => field === '')) {
        return;
      }
      const definition = parseTrainRecord(row, line);
      if (seen.has(definition.id)) {
        throw new TrainCatalogFormatError(`Duplicate train id ${definition.id}`, line);
      }
      seen.add(definition.id);
      definitions.push(definition);
    });

    return definitions;
  }
}
