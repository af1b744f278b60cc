import { IsIn, IsInt, IsISO8601, IsOptional, Max, Min } from 'class-validator';

export type TimelineOrder = 'asc' | 'desc';

export const DEFAULT_TIMELINE_LIMIT = 50;
export const MAX_TIMELINE_LIMIT = 500;

export class TimelineQueryDto {
  @IsIn(['asc', 'desc'])
  @IsOptional()
  order?: TimelineOrder;

  @IsInt()
  @IsOptional()
  @Min(1)
  @Max(MAX_TIMELINE_LIMIT)
  limit?: number;

  @IsInt()
  @IsOptional()
  @Min(0)
  offset?: number;

  /** Inclusive lower bound on the send timestamp */
  @IsISO8601()
  @IsOptional()
  since?: string;

  /** Exclusive upper bound on the send timestamp */
  @IsISO8601()
  @IsOptional()
  until?: string;
}
