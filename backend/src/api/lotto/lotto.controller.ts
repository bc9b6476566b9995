import { Controller, Get, HttpCode, HttpStatus, InternalServerErrorException, Post, Query } from '@nestjs/common';
import { DrawPreconditionError } from '../../lotto/errors/draw-precondition.error';
import { DrawQueryDto } from './dto/draw-query.dto';
import { StatsQueryDto } from './dto/stats-query.dto';
import { DrawView, LottoService, StatsView } from './lotto.service';

/**
 * Lotto API
 * Number statistics and weighted draws for the presentation layer
 */
@Controller('api/lotto')
export class LottoController {
  constructor(private readonly lottoService: LottoService) {}

  /**
   * Current dataset and its source status
   * GET /api/lotto/stats?sort=number|count
   */
  @Get('stats')
  async getStats(@Query() query: StatsQueryDto): Promise<{ success: boolean; data: StatsView }> {
    const data = await this.lottoService.getCurrentDataset(query.sort);
    return { success: true, data };
  }

  /**
   * Force a refresh from the live source
   * POST /api/lotto/stats/refresh
   */
  @Post('stats/refresh')
  @HttpCode(HttpStatus.OK)
  async refreshStats(@Query() query: StatsQueryDto): Promise<{ success: boolean; data: StatsView }> {
    const data = await this.lottoService.refreshDataset(query.sort);
    return { success: true, data };
  }

  /**
   * Generate a fresh batch of number sets
   * POST /api/lotto/draw?numSets=5&pickSize=7&smoothing=100
   */
  @Post('draw')
  @HttpCode(HttpStatus.OK)
  async draw(@Query() query: DrawQueryDto): Promise<{ success: boolean; data: DrawView }> {
    try {
      const data = await this.lottoService.drawBatch(query);
      return { success: true, data };
    } catch (error) {
      if (error instanceof DrawPreconditionError) {
        throw new InternalServerErrorException(error.message);
      }
      throw error;
    }
  }
}
