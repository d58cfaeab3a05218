import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Min } from 'class-validator';

export const ADDRESS_SORT_KEYS = ['label', 'city', 'createdAt'] as const;
export type AddressSortKey = (typeof ADDRESS_SORT_KEYS)[number];

export class ListAddressesQueryDto {
  @IsOptional()
  @IsIn(ADDRESS_SORT_KEYS)
  public readonly sortBy?: AddressSortKey;

  @IsOptional()
  @IsIn(['asc', 'desc'])
  public readonly sortDir?: 'asc' | 'desc';

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  public readonly limit?: number;
}
