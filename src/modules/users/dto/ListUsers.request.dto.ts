import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { MAX_PAGE_SIZE } from '../../../lib/persistence';

export const USER_SORT_KEYS = ['name', 'email', 'createdAt'] as const;
export type UserSortKey = (typeof USER_SORT_KEYS)[number];

export class ListUsersQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_PAGE_SIZE)
  public readonly size?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  public readonly page?: number;

  @IsOptional()
  @IsString()
  public readonly name?: string;

  @IsOptional()
  @IsString()
  public readonly email?: string;

  @IsOptional()
  @IsIn(USER_SORT_KEYS)
  public readonly sortBy?: UserSortKey;

  @IsOptional()
  @IsIn(['asc', 'desc'])
  public readonly sortDir?: 'asc' | 'desc';
}
