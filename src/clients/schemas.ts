import { jot, type InferJot } from '../jot.js';

const open = { allowAdditionalProperties: true };

const commentNode = jot.object(
  {
    id: jot.string(),
    body: jot.string(),
    permalink: jot.string(),
    subreddit: jot.string(),
    score: jot.number({ integer: true }),
    created_utc: jot.number(),
    can_gild: jot.optional(jot.boolean()),
  },
  open,
);

export const listingNode = jot.object(
  {
    data: jot.object(
      {
        children: jot.array(jot.object({ data: commentNode }, open)),
        after: jot.optional(jot.string()),
        before: jot.optional(jot.string()),
      },
      open,
    ),
  },
  open,
);

export type ListingPayload = InferJot<typeof listingNode>;

export const accessTokenNode = jot.object(
  {
    access_token: jot.optional(jot.string()),
    token_type: jot.optional(jot.string()),
    expires_in: jot.optional(jot.number()),
    scope: jot.optional(jot.string()),
    error: jot.optional(jot.string()),
    error_description: jot.optional(jot.string()),
  },
  open,
);

export type AccessTokenPayload = InferJot<typeof accessTokenNode>;
