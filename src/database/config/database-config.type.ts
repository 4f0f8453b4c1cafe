export type DatabaseConfig = {
  url?: string;
  type: 'postgres';
  host?: string;
  port?: number;
  password?: string;
  name?: string;
  username?: string;
  synchronize: boolean;
  logging: boolean;
  maxConnections: number;
};
