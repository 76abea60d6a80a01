export interface JwtPayload {
  sub: string; // user id
  username: string;
  iat?: number;
  exp?: number;
}
