import { Body, Controller, Get, HttpCode, Post, Req, UseGuards } from '@nestjs/common';
import { ObjectId } from 'mongodb';
import { InvalidTokenError } from '../../lib/errors/AuthError';
import { toHttpException } from '../../lib/errors/http';
import { isHex24 } from '../../lib/utils/strings';
import type { UserResponseDto } from '../users/dto/User.response.dto';
import { UsersService } from '../users/users.service';
import { AuthService } from './auth.service';
import { LoginRequestDto } from './dto/Login.request.dto';
import type { LoginResponseDto } from './dto/Login.response.dto';
import { JwtAuthGuard, type AuthenticatedRequest } from './jwt-auth.guard';

@Controller('api/auth')
export class AuthController {
  public constructor(
    private readonly auth: AuthService,
    private readonly users: UsersService,
  ) {}

  @Post('login')
  @HttpCode(200)
  public async login(@Body() body: LoginRequestDto): Promise<LoginResponseDto> {
    try {
      return await this.auth.login(body.email, body.password);
    } catch (err) {
      throw toHttpException(err);
    }
  }

  /** The user the bearer token was issued to. */
  @Get('me')
  @UseGuards(JwtAuthGuard)
  public async me(@Req() req: AuthenticatedRequest): Promise<UserResponseDto> {
    try {
      const sub = req.user?.sub;
      if (!isHex24(sub)) throw new InvalidTokenError('subject is not a user id');
      return await this.users.get(new ObjectId(sub));
    } catch (err) {
      throw toHttpException(err);
    }
  }
}
