import { Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import { DatabaseClient } from './database.client';

export const DATABASE_CLIENT = Symbol('DATABASE_CLIENT');

@Module({
  providers: [
    {
      provide: DATABASE_CLIENT,
      useFactory: async () => {
        return await DatabaseClient.initialize();
      },
    },
  ],
  exports: [DATABASE_CLIENT],
})
export class DatabaseModule implements OnApplicationShutdown {
  constructor(@Inject(DATABASE_CLIENT) private readonly client: DatabaseClient) { }

  async onApplicationShutdown(): Promise<void> {
    await this.client.disconnect();
  }
}
