import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { UsersService } from './users.service';
import { CreateUserRequestDto } from './dto/CreateUser.request.dto';
import { UserIdParamsDto } from './dto/UserId.request.dto';
import {
  toUserDto,
  type CreateUserResponseDto,
  type GetUserResponseDto,
} from './dto/User.response.dto';
import type { UserCreationResult } from './users.types';
import { ApiHttpException } from '../../lib/errors/ApiHttpException';

@Controller('users')
export class UsersController {
  public constructor(private readonly users: UsersService) {}

  /** POST /api/users */
  @Post()
  public async create(
    @Body() body: CreateUserRequestDto,
  ): Promise<CreateUserResponseDto> {
    const result: UserCreationResult = await this.users.create({
      name: body.name,
      email: body.email,
    });
    if (!result.success) {
      throw ApiHttpException.fromCreationFailure('user', result);
    }
    return { success: true, user: toUserDto(result.entity) };
  }

  /** GET /api/users/:id */
  @Get(':id')
  public async get(
    @Param() params: UserIdParamsDto,
  ): Promise<GetUserResponseDto> {
    const user = await this.users.getById(params.id);
    if (!user) throw ApiHttpException.notFound('User not found');
    return { success: true, user: toUserDto(user) };
  }
}
