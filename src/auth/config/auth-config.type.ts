export type AuthConfig = {
  sessionCookie: string;
  sessionMaxAge: number;
};
