import {
  BadRequestException,
  Body,
  Controller,
  Get,
  NotFoundException,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import {
  INTEL_CATEGORIES,
  QUERY_MAX_LIMIT,
  SCORE_MAX,
  SCORE_MIN,
  SERVICE_NAME,
} from './config/intel.constants';
import {
  IntelCategory,
  PersistedIntel,
  ResolutionSummary,
  RunRecord,
  RunSummary,
} from './types/intel.types';
import { IntelPipelineService, RunOptions } from './services/intel-pipeline.service';
import { IntelStorageService } from './services/intel-storage.service';

@Controller()
export class IntelController {
  constructor(
    private readonly pipelineService: IntelPipelineService,
    private readonly storageService: IntelStorageService,
  ) {}

  @Get('health')
  getHealth(): { status: string; service: string } {
    return {
      status: 'ok',
      service: SERVICE_NAME,
    };
  }

  @Get('intel')
  async listIntel(
    @Query('category') category?: string,
    @Query('competitor') competitor?: string,
    @Query('minImpact') minImpact?: string,
    @Query('minRelevance') minRelevance?: string,
    @Query('minNovelty') minNovelty?: string,
    @Query('days') days?: string,
    @Query('includeDuplicates') includeDuplicates?: string,
    @Query('limit') limit?: string,
  ): Promise<PersistedIntel[]> {
    return this.storageService.queryIntel({
      category: this.parseCategory(category),
      competitorId: competitor?.trim() || undefined,
      minImpact: this.parseRange(minImpact, 'minImpact', SCORE_MIN, SCORE_MAX),
      minRelevance: this.parseRange(
        minRelevance,
        'minRelevance',
        SCORE_MIN,
        SCORE_MAX,
      ),
      minNovelty: this.parseRange(minNovelty, 'minNovelty', 0, 1),
      windowDays: this.parsePositiveInt(days, 'days'),
      includeDuplicates: this.parseBoolean(
        includeDuplicates,
        'includeDuplicates',
      ),
      limit: this.parsePositiveInt(limit, 'limit', QUERY_MAX_LIMIT),
    });
  }

  @Get('intel/runs/latest')
  async getLatestRun(): Promise<RunRecord | { message: string }> {
    return (
      (await this.storageService.getLatestRun()) ?? {
        message: 'no run recorded yet',
      }
    );
  }

  @Get('intel/:id')
  async getIntel(@Param('id') idRaw: string): Promise<PersistedIntel> {
    const id = this.parsePositiveInt(idRaw, 'id');
    if (id === undefined) {
      throw new BadRequestException('id is required');
    }
    const intel = await this.storageService.getIntel(id);
    if (!intel) {
      throw new NotFoundException(`intel ${id} not found`);
    }
    return intel;
  }

  @Post('intel/runs')
  async runPipeline(
    @Body('timeoutSec') timeoutSec?: unknown,
    @Body('useVectorSearch') useVectorSearch?: unknown,
  ): Promise<RunSummary> {
    return this.pipelineService.runPipeline(
      this.parseRunOptions(timeoutSec, useVectorSearch),
    );
  }

  @Post('intel/resolve')
  async resolvePending(
    @Body('timeoutSec') timeoutSec?: unknown,
    @Body('useVectorSearch') useVectorSearch?: unknown,
  ): Promise<ResolutionSummary> {
    return this.pipelineService.resolvePending(
      this.parseRunOptions(timeoutSec, useVectorSearch),
    );
  }

  @Post('intel/vector-index/reset')
  async resetVectorIndex(): Promise<{ reset: true }> {
    await this.pipelineService.resetVectorIndex();
    return { reset: true };
  }

  private parseRunOptions(
    timeoutSec: unknown,
    useVectorSearch: unknown,
  ): RunOptions {
    const options: RunOptions = {};
    if (timeoutSec != null && timeoutSec !== '') {
      const parsed = Number(timeoutSec);
      if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new BadRequestException('timeoutSec must be a positive number');
      }
      options.timeoutSec = parsed;
    }
    if (useVectorSearch != null && useVectorSearch !== '') {
      options.useVectorSearch = this.parseBoolean(
        useVectorSearch,
        'useVectorSearch',
      );
    }
    return options;
  }

  private parseCategory(value: string | undefined): IntelCategory | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    const lowered = value.trim().toLowerCase();
    const category = INTEL_CATEGORIES.find((entry) => entry === lowered);
    if (!category) {
      throw new BadRequestException(
        `category must be one of ${INTEL_CATEGORIES.join(', ')}`,
      );
    }
    return category;
  }

  private parseRange(
    value: string | undefined,
    fieldName: string,
    min: number,
    max: number,
  ): number | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
      throw new BadRequestException(
        `${fieldName} must be a number between ${min} and ${max}`,
      );
    }
    return parsed;
  }

  private parsePositiveInt(
    value: string | undefined,
    fieldName: string,
    max?: number,
  ): number | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      throw new BadRequestException(`${fieldName} must be a positive integer`);
    }
    return max !== undefined ? Math.min(parsed, max) : parsed;
  }

  private parseBoolean(value: unknown, fieldName: string): boolean {
    if (value == null || value === '') {
      return false;
    }
    if (typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'number') {
      if (value === 1) {
        return true;
      }
      if (value === 0) {
        return false;
      }
    }
    if (typeof value === 'string') {
      const lowered = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'y'].includes(lowered)) {
        return true;
      }
      if (['0', 'false', 'no', 'n'].includes(lowered)) {
        return false;
      }
    }

    throw new BadRequestException(`${fieldName} must be a boolean value`);
  }
}
