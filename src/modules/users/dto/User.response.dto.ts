import type { User } from '../users.types';

export interface UserDto {
  id: string;
  name: string;
  email: string;
  apiKey: string;
  registeredAt: string; // ISO-8601
}

export interface CreateUserResponseDto {
  success: true;
  user: UserDto;
}

export interface GetUserResponseDto {
  success: true;
  user: UserDto;
}

export function toUserDto(user: User): UserDto {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    apiKey: user.apiKey,
    registeredAt: user.registeredAt.toISOString(),
  };
}
