import { IsIn, IsOptional } from 'class-validator';

export const STATS_SORT_KEYS = ['number', 'count'] as const;
export type StatsSortKey = (typeof STATS_SORT_KEYS)[number];

export class StatsQueryDto {
  @IsOptional()
  @IsIn(STATS_SORT_KEYS)
  sort?: StatsSortKey;
}
