import "reflect-metadata";
import { Module, DynamicModule, Provider, Logger } from "@nestjs/common";
import type {
  InjectionToken,
  ModuleMetadata,
  OptionalFactoryDependency,
} from "@nestjs/common";
import { buildConsumerOptions } from "../consumer/builder";
import type { ConsumerOption } from "../consumer/option";
import { resolveMaxReconsumeTimes } from "../consumer/options";
import type { ConsumerOptions } from "../consumer/options";
import { getConsumerOptionsToken } from "./consumer-options.constants";

/** Shared configuration fields for both `register()` and `registerAsync()`. */
interface ConsumerOptionsModuleBaseOptions {
  /** Optional name for multi-consumer setups. Must match `@InjectConsumerOptions(name)`. */
  name?: string;
  /** If true, makes the options available globally without importing the module in every feature module. */
  isGlobal?: boolean;
}

/** Synchronous configuration for `ConsumerOptionsModule.register()`. */
export interface ConsumerOptionsModuleOptions
  extends ConsumerOptionsModuleBaseOptions {
  /** Option functions applied in order over the defaults. */
  options: ConsumerOption[];
}

/** Async configuration for `ConsumerOptionsModule.registerAsync()` with dependency injection. */
export interface ConsumerOptionsModuleAsyncOptions<T extends unknown[] = []>
  extends ConsumerOptionsModuleBaseOptions,
    Pick<ModuleMetadata, "imports"> {
  /** Arguments match the providers listed in `inject`. */
  useFactory: (...args: T) => ConsumerOption[] | Promise<ConsumerOption[]>;
  inject?: (InjectionToken | OptionalFactoryDependency)[];
}

/**
 * NestJS dynamic module that builds and provides a frozen consumer configuration.
 * Use `register()` for static option lists or `registerAsync()` for DI-based ones.
 * A configuration error fails module initialisation.
 */
@Module({})
export class ConsumerOptionsModule {
  /** Register consumer options built from a static option list. */
  static register(moduleOptions: ConsumerOptionsModuleOptions): DynamicModule {
    const provider: Provider = {
      provide: getConsumerOptionsToken(moduleOptions.name),
      useFactory: () => ConsumerOptionsModule.build(moduleOptions.options),
    };

    return {
      global: moduleOptions.isGlobal ?? false,
      module: ConsumerOptionsModule,
      providers: [provider],
      exports: [provider],
    };
  }

  /** Register consumer options whose option list comes from a factory. */
  static registerAsync<T extends unknown[] = []>(
    asyncOptions: ConsumerOptionsModuleAsyncOptions<T>,
  ): DynamicModule {
    const provider: Provider = {
      provide: getConsumerOptionsToken(asyncOptions.name),
      useFactory: async (...args: T) =>
        ConsumerOptionsModule.build(await asyncOptions.useFactory(...args)),
      inject: asyncOptions.inject ?? [],
    };

    return {
      global: asyncOptions.isGlobal ?? false,
      module: ConsumerOptionsModule,
      imports: asyncOptions.imports ?? [],
      providers: [provider],
      exports: [provider],
    };
  }

  private static build(options: ConsumerOption[]): Readonly<ConsumerOptions> {
    const built = buildConsumerOptions(...options);
    new Logger(`ConsumerOptions:${built.groupName}`).log(
      `Built consumer options (model: ${built.consumerModel}, ` +
        `orderly: ${built.consumeOrderly}, strategy: ${built.allocateStrategy.name}, ` +
        `maxReconsumeTimes: ${resolveMaxReconsumeTimes(built)}, ` +
        `interceptors: ${built.interceptors.length})`,
    );
    return built;
  }
}
