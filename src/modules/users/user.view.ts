import type { UserEntity } from './entities/user.entity';

export interface UserView {
  id: number;
  username: string;
}

export interface LoginView {
  access_token: string;
  user_id: number;
  username: string;
}

export function toUserView(user: UserEntity): UserView {
  return { id: user.id, username: user.username };
}
