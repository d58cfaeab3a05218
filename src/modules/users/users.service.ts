import { Injectable } from '@nestjs/common';
import type { ObjectId } from 'mongodb';
import { BadRequestError } from '../../lib/errors/AppError';
import {
  BaseService,
  type EntityChanges,
  type Lookup,
  type NewEntity,
  type Page,
  type SortSpec,
} from '../../lib/persistence';
import { PasswordHasher } from '../security/password.hasher';
import type { CreateAddressRequestDto } from './dto/CreateAddress.request.dto';
import type { CreateUserRequestDto } from './dto/CreateUser.request.dto';
import type { ListAddressesQueryDto } from './dto/ListAddresses.request.dto';
import type { ListUsersQueryDto } from './dto/ListUsers.request.dto';
import type { UpdateAddressRequestDto } from './dto/UpdateAddress.request.dto';
import type { UpdateUserRequestDto } from './dto/UpdateUser.request.dto';
import type { AddressResponseDto, UserResponseDto } from './dto/User.response.dto';
import {
  ADDRESSES_FIELD,
  normalizeEmail,
  parseAddress,
  type AddressEntity,
  type UserEntity,
  type UserFilter,
} from './internal/users.types';
import { UsersRepository } from './users.repository';

function direction(dir?: 'asc' | 'desc'): 1 | -1 {
  return dir === 'desc' ? -1 : 1;
}

export function toAddressOutput(a: AddressEntity): AddressResponseDto {
  return {
    id: a._id.toHexString(),
    label: a.label,
    street: a.street,
    city: a.city,
    primary: a.primary,
    createdAt: a.createdAt.toISOString(),
    updatedAt: a.updatedAt?.toISOString(),
  };
}

@Injectable()
export class UsersService extends BaseService<
  UserEntity,
  CreateUserRequestDto,
  UpdateUserRequestDto,
  UserResponseDto,
  UserFilter
> {
  protected readonly uniqueFields = ['email'] as const;
  protected readonly nestedFields = [ADDRESSES_FIELD] as const;

  public constructor(
    repository: UsersRepository,
    private readonly hasher: PasswordHasher,
  ) {
    super(repository);
  }

  protected async toEntity(input: CreateUserRequestDto): Promise<NewEntity<UserEntity>> {
    return {
      email: normalizeEmail(input.email),
      name: input.name.trim(),
      passwordHash: await this.hasher.hash(input.password),
      addresses: [],
    };
  }

  protected async toPatch(
    input: UpdateUserRequestDto,
  ): Promise<Partial<EntityChanges<UserEntity>>> {
    return {
      email: input.email === undefined ? undefined : normalizeEmail(input.email),
      name: input.name?.trim(),
      passwordHash:
        input.password === undefined ? undefined : await this.hasher.hash(input.password),
    };
  }

  protected toOutput(user: UserEntity): UserResponseDto {
    return {
      id: user._id.toHexString(),
      email: user.email,
      name: user.name,
      addresses: user.addresses.map(toAddressOutput),
      createdAt: user.createdAt.toISOString(),
      updatedAt: user.updatedAt?.toISOString(),
    };
  }

  /** One page of users, filtered by exact name and email. */
  public async listUsers(query: ListUsersQueryDto): Promise<Page<UserResponseDto>> {
    const filter: UserFilter = {
      name: query.name,
      email: query.email === undefined ? undefined : normalizeEmail(query.email),
    };
    const sort: SortSpec | undefined = query.sortBy
      ? [[query.sortBy, direction(query.sortDir)]]
      : undefined;
    return this.paginate({ size: query.size, page: query.page, filter, sort });
  }

  /** Stored record for a login attempt; absent when no user has the email. */
  public async findByEmail(email: string): Promise<Lookup<UserEntity>> {
    return this.repository.search({ email: normalizeEmail(email) });
  }

  /* =========================
   *        Addresses
   * ========================= */

  public async listAddresses(
    userId: ObjectId,
    query: ListAddressesQueryDto = {},
  ): Promise<AddressResponseDto[]> {
    const sort: SortSpec | undefined = query.sortBy
      ? [[query.sortBy, direction(query.sortDir)]]
      : undefined;
    const items = await this.listNested(userId, ADDRESSES_FIELD, parseAddress, {
      sort,
      limit: query.limit,
    });
    return items.map(toAddressOutput);
  }

  public async countAddresses(userId: ObjectId): Promise<number> {
    return this.countNested(userId, ADDRESSES_FIELD);
  }

  public async addAddress(
    userId: ObjectId,
    input: CreateAddressRequestDto,
  ): Promise<AddressResponseDto> {
    const created = await this.addNested(
      userId,
      ADDRESSES_FIELD,
      {
        label: input.label,
        street: input.street,
        city: input.city,
        primary: input.primary ?? false,
      },
      parseAddress,
    );
    return toAddressOutput(created);
  }

  public async getAddress(userId: ObjectId, addressId: ObjectId): Promise<AddressResponseDto> {
    const address = await this.getNested(userId, ADDRESSES_FIELD, parseAddress, {
      nestedId: addressId,
    });
    return toAddressOutput(address);
  }

  /**
   * Set the given fields on one address. With `upsert` the body must be a
   * complete address, since it may become a new element.
   */
  public async updateAddress(
    userId: ObjectId,
    addressId: ObjectId,
    input: UpdateAddressRequestDto,
    upsert = false,
  ): Promise<AddressResponseDto> {
    const changes = {
      label: input.label,
      street: input.street,
      city: input.city,
      primary: input.primary,
    };
    if (upsert) {
      if (changes.label === undefined || changes.street === undefined || changes.city === undefined) {
        throw new BadRequestError(
          'Upserting an address needs label, street and city',
          'INCOMPLETE_ADDRESS',
        );
      }
      changes.primary = changes.primary ?? false;
    }
    const updated = await this.updateNested(
      userId,
      addressId,
      ADDRESSES_FIELD,
      changes,
      parseAddress,
      { upsert },
    );
    return toAddressOutput(updated);
  }

  public async removeAddress(userId: ObjectId, addressId: ObjectId): Promise<void> {
    await this.removeNested(userId, addressId, ADDRESSES_FIELD);
  }
}
