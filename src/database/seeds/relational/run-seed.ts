import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { SeedModule } from './seed.module';
import { UserSeedService } from './user/user-seed.service';
import { EventSeedService } from './event/event-seed.service';

const runSeed = async () => {
  const app = await NestFactory.create(SeedModule);

  try {
    const { ADMIN_EMAIL, ADMIN_PASSWORD } = process.env;
    if (ADMIN_EMAIL && ADMIN_PASSWORD) {
      await app.get(UserSeedService).run({
        name: process.env.ADMIN_NAME || 'Admin',
        email: ADMIN_EMAIL,
        username: process.env.ADMIN_USERNAME || 'admin',
        password: ADMIN_PASSWORD,
      });
    } else {
      console.log('ADMIN_EMAIL or ADMIN_PASSWORD not set, skipping admin');
    }

    if (process.env.NODE_ENV !== 'production') {
      await app.get(EventSeedService).run();
    }
  } finally {
    await app.close();
  }
};

runSeed().catch((error) => {
  console.error('Fatal error during seeding:', error);
  process.exit(1);
});
