import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

// Routes and controllers marked @Public() skip the JWT guard.
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
