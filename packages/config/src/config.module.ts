import { Global, Module } from "@nestjs/common";
import { ConfigModule as NestConfigModule } from "@nestjs/config";
import {
  ConfigurableModuleClass,
  PRESET_CATALOG_TOKEN,
  RUNTIME_OPTIONS_TOKEN,
} from "./config.const";
import { strataConfig } from "./config.namespace";
import { ConfigService } from "./config.service";
import { DocumentLoader } from "./loader/document-loader";
import { SchemaMigrator } from "./migrations";
import { BaseRegistry } from "./registry/base-registry";
import { InheritanceResolver } from "./resolver/inheritance-resolver";
import {
  presetCatalogProvider,
  runtimeOptionsProvider,
} from "./runtime-options.provider";
import type { ResolverRuntimeOptions } from "./types";
import { ConfigValidator } from "./validation/config-validator";

@Global()
@Module({
  imports: [NestConfigModule.forFeature(strataConfig)],
  providers: [
    runtimeOptionsProvider,
    presetCatalogProvider,
    BaseRegistry,
    DocumentLoader,
    SchemaMigrator,
    InheritanceResolver,
    ConfigValidator,
    ConfigService,
  ],
  exports: [
    RUNTIME_OPTIONS_TOKEN,
    PRESET_CATALOG_TOKEN,
    BaseRegistry,
    DocumentLoader,
    SchemaMigrator,
    InheritanceResolver,
    ConfigValidator,
    ConfigService,
  ],
})
export class ConfigModule extends ConfigurableModuleClass {
  static register(
    options: ResolverRuntimeOptions,
  ): ReturnType<(typeof ConfigurableModuleClass)["register"]> {
    return {
      ...super.register(options),
      global: true,
    };
  }
}
