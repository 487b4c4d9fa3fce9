import { Module, type DynamicModule } from "@nestjs/common";
import { ConfigModule, type ResolverRuntimeOptions } from "@strata/config";
import { IoModule } from "@strata/io";
import { CliModule } from "./cli/cli.module";

export type AppModuleOptions = ResolverRuntimeOptions;

@Module({
  imports: [IoModule, CliModule],
})
export class AppModule {
  static forRoot(options: AppModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [ConfigModule.register(options)],
    };
  }
}
