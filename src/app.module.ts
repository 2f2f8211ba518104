import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AgentRelayModule } from './agent-relay.module';
import { AgentRelayConfig } from './interfaces/config.interface';
import { httpConfig, relayConfig } from './config/relay.config';

@Module({})
export class AppModule {
  /**
   * @param envFilePath Optional .env file to load before validating the environment
   */
  static register(envFilePath?: string): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath,
          load: [relayConfig, httpConfig],
        }),
        AgentRelayModule.forRootAsync({
          inject: [ConfigService],
          useFactory: (configService: ConfigService) =>
            configService.getOrThrow<AgentRelayConfig>('relay'),
        }),
      ],
    };
  }
}
