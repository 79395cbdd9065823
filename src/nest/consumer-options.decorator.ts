import { Inject } from "@nestjs/common";
import { getConsumerOptionsToken } from "./consumer-options.constants";

/** Inject frozen `ConsumerOptions`. Pass a name to target a specific registration. */
export const InjectConsumerOptions = (name?: string): ParameterDecorator =>
  Inject(getConsumerOptionsToken(name));
