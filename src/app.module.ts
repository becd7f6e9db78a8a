import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RegistryModule } from './infrastructure/http/registry.module';
import { registryConfig } from './shared/config/registry.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [registryConfig],
      envFilePath: ['.env', '.env.local'],
    }),
    RegistryModule,
  ],
})
export class AppModule {}
