import type { DefaultSession } from 'next-auth';
import type { UserType } from '@/lib/db/models/user';

type TokenError = 'RefreshAccessTokenError';

declare module 'next-auth' {
  interface Session {
    accessToken?: string;
    error?: TokenError;
    user: DefaultSession['user'] & {
      id?: string;
      userType?: UserType;
    };
  }
}

declare module 'next-auth/jwt' {
  interface JWT {
    accessToken?: string;
    /** Epoch milliseconds. */
    accessTokenExpires?: number;
    refreshToken?: string;
    error?: TokenError;
    userId?: string;
    userType?: UserType;
  }
}
