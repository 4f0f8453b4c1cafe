export type LogFormat = 'text' | 'json';

export type AppConfig = {
  nodeEnv: string;
  name: string;
  backendDomain: string;
  port: number;
  logFormat: LogFormat;
};
