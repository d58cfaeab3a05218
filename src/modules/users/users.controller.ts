import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import type { ObjectId } from 'mongodb';
import { toHttpException } from '../../lib/errors/http';
import { ParseObjectIdPipe } from '../../lib/http/object-id.pipe';
import type { Page } from '../../lib/persistence';
import { CreateAddressRequestDto } from './dto/CreateAddress.request.dto';
import { CreateUserRequestDto } from './dto/CreateUser.request.dto';
import { ListAddressesQueryDto } from './dto/ListAddresses.request.dto';
import { ListUsersQueryDto } from './dto/ListUsers.request.dto';
import {
  UpdateAddressQueryDto,
  UpdateAddressRequestDto,
} from './dto/UpdateAddress.request.dto';
import { UpdateUserRequestDto } from './dto/UpdateUser.request.dto';
import type {
  AddressResponseDto,
  CountResponseDto,
  UserResponseDto,
} from './dto/User.response.dto';
import { UsersService } from './users.service';

@Controller('api/users')
export class UsersController {
  public constructor(private readonly users: UsersService) {}

  private mapDomainError(err: unknown): never {
    throw toHttpException(err);
  }

  @Get()
  public async list(@Query() query: ListUsersQueryDto): Promise<Page<UserResponseDto>> {
    try {
      return await this.users.listUsers(query);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Get(':id')
  public async get(@Param('id', ParseObjectIdPipe) id: ObjectId): Promise<UserResponseDto> {
    try {
      return await this.users.get(id);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Post()
  public async create(@Body() body: CreateUserRequestDto): Promise<UserResponseDto> {
    try {
      return await this.users.create(body);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Patch(':id')
  public async update(
    @Param('id', ParseObjectIdPipe) id: ObjectId,
    @Body() body: UpdateUserRequestDto,
  ): Promise<UserResponseDto> {
    try {
      return await this.users.update(id, body);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Delete(':id')
  @HttpCode(204)
  public async remove(@Param('id', ParseObjectIdPipe) id: ObjectId): Promise<void> {
    try {
      await this.users.delete(id);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  /* ---------- addresses ---------- */

  @Get(':id/addresses')
  public async listAddresses(
    @Param('id', ParseObjectIdPipe) id: ObjectId,
    @Query() query: ListAddressesQueryDto,
  ): Promise<AddressResponseDto[]> {
    try {
      return await this.users.listAddresses(id, query);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Get(':id/addresses/count')
  public async countAddresses(
    @Param('id', ParseObjectIdPipe) id: ObjectId,
  ): Promise<CountResponseDto> {
    try {
      return { count: await this.users.countAddresses(id) };
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Post(':id/addresses')
  public async addAddress(
    @Param('id', ParseObjectIdPipe) id: ObjectId,
    @Body() body: CreateAddressRequestDto,
  ): Promise<AddressResponseDto> {
    try {
      return await this.users.addAddress(id, body);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Get(':id/addresses/:addressId')
  public async getAddress(
    @Param('id', ParseObjectIdPipe) id: ObjectId,
    @Param('addressId', ParseObjectIdPipe) addressId: ObjectId,
  ): Promise<AddressResponseDto> {
    try {
      return await this.users.getAddress(id, addressId);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Patch(':id/addresses/:addressId')
  public async updateAddress(
    @Param('id', ParseObjectIdPipe) id: ObjectId,
    @Param('addressId', ParseObjectIdPipe) addressId: ObjectId,
    @Body() body: UpdateAddressRequestDto,
    @Query() query: UpdateAddressQueryDto,
  ): Promise<AddressResponseDto> {
    try {
      return await this.users.updateAddress(id, addressId, body, query.upsert === true);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Delete(':id/addresses/:addressId')
  @HttpCode(204)
  public async removeAddress(
    @Param('id', ParseObjectIdPipe) id: ObjectId,
    @Param('addressId', ParseObjectIdPipe) addressId: ObjectId,
  ): Promise<void> {
    try {
      await this.users.removeAddress(id, addressId);
    } catch (err) {
      this.mapDomainError(err);
    }
  }
}
