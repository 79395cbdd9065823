import type { ConsumerOption } from "../option";
import { withConsumerModel, withGroupName, withNameServer } from "../option";
import { MessageModel, defaultConsumerOptions } from "../options";
import type { ConsumerOptions } from "../options";

export const NAME_SERVER = "127.0.0.1:9876";

/** Options that make a default configuration valid. */
export function requiredOptions(group = "test-group"): ConsumerOption[] {
  return [
    withGroupName(group),
    withNameServer([NAME_SERVER]),
    withConsumerModel(MessageModel.CLUSTERING),
  ];
}

/** Apply `options` over fresh defaults without validating. */
export function applied(...options: ConsumerOption[]): ConsumerOptions {
  const draft = defaultConsumerOptions(new Date(Date.UTC(2024, 0, 1, 12, 0, 0)));
  for (const option of options) option(draft);
  return draft;
}
