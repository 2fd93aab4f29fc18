// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type ActorId = Brand<string, "ActorId">;
export type LocalId = Brand<bigint, "LocalId">;
export type DeviceId = Brand<number, "DeviceId">;

/** Globally unique once issued: the author plus a number only they allocate. */
export type MessageId = readonly [actor: ActorId, local: LocalId];

export type Tag = string;
export type Reaction = string;

export const asActorId = (s: string): ActorId => s as ActorId;
export const asLocalId = (n: bigint): LocalId => n as LocalId;
export const asDeviceId = (n: number): DeviceId => n as DeviceId;

export const messageId = (actor: ActorId, local: LocalId): MessageId => [actor, local];
