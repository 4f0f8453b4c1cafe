import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { AllConfigType } from '../config/config.type';

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    const nodeEnv = this.configService.get('app.nodeEnv', { infer: true });
    const queryLogging = this.configService.get('database.logging', {
      infer: true,
    });
    const type = this.configService.getOrThrow('database.type', {
      infer: true,
    });

    return {
      type,
      url: this.configService.get('database.url', { infer: true }),
      host: this.configService.get('database.host', { infer: true }),
      port: this.configService.get('database.port', { infer: true }),
      username: this.configService.get('database.username', { infer: true }),
      password: this.configService.get('database.password', { infer: true }),
      database: this.configService.get('database.name', { infer: true }),
      synchronize: this.configService.get('database.synchronize', {
        infer: true,
      }),
      dropSchema: false,
      keepConnectionAlive: true,
      logging: queryLogging ? ['error', 'warn', 'query'] : ['error', 'warn'],
      autoLoadEntities: true,
      migrations: [__dirname + '/migrations/**/*{.ts,.js}'],
      extra: {
        // based on https://node-postgres.com/api/pool
        max: this.configService.get('database.maxConnections', {
          infer: true,
        }),
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
        application_name: `event_rsvp_${nodeEnv}`,
      },
    };
  }
}
