// src/reservation/services/train-registry.service.ts

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Train } from '../domain/train';
import { TrainDefinition } from '../interfaces/reservation.interface';
import { loadReservationSettings } from '../reservation.config';
import { TrainCatalogLoaderService } from './train-catalog-loader.service';

/**
 * 车次注册表
 *
 * 启动时从目录文件加载，之后只读（查找无需加锁）
 */
@Injectable()
export class TrainRegistryService implements OnModuleInit {
  private readonly logger = new Logger(TrainRegistryService.name);
  private readonly trains = new Map<string, Train>();

  constructor(
    private readonly catalogLoader: TrainCatalogLoaderService,
    private readonly configService: ConfigService,
  ) {}

  onModuleInit(): void {
    const { catalogPath } = loadReservationSettings(this.configService);
    const definitions = this.catalogLoader.loadFromFile(catalogPath);
    definitions.forEach(definition => this.register(definition));
    this.logger.log(`Train registry ready with ${this.trains.size} trains`);
  }

  register(definition: TrainDefinition): Train {
    const train = new Train(definition);
    if (this.trains.has(train.id)) {
      this.logger.warn(`Train ${train.id} registered twice, replacing previous definition`);
    }
    this.trains.set(train.id, train);
    return train;
  }

  get(trainId: string): Train | undefined {
    return this.trains.get(trainId);
  }

  all(): Train[] {
    return [...this.trains.values()];
  }
}
