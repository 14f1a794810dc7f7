import { t, field } from "../../src/types";

export class User {
  id = 0;
  name = "";
  signupTs: Date | undefined = undefined;
  friends: number[] = [];
}

export const UserType = t.struct(User, {
  id: t.int,
  name: t.string,
  signupTs: t.optional(t.date),
  friends: field(t.list(t.int), { defaultFactory: () => [] }),
});

export function makeUser(init: Partial<User>): User {
  return Object.assign(new User(), init);
}

/** A class no descriptor or strategy knows about. */
export class Opaque {
  secret = 1;
}
