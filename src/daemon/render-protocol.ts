import { z } from 'zod';

export const COLOR_PROFILES = ['Ascii', 'ANSI', 'ANSI256', 'TrueColor'] as const;

export type ColorProfile = (typeof COLOR_PROFILES)[number];

export const DEFAULT_COLOR_PROFILE: ColorProfile = 'ANSI256';

const intField = z.number().int();

export const clickableRegionSchema = z.object({
  start_line: intField,
  end_line: intField,
  start_col: intField.default(0),
  end_col: intField.default(0),
  action: z.string().default(''),
  target: z.string().default(''),
});

export type ClickableRegion = z.infer<typeof clickableRegionSchema>;

export const renderPayloadSchema = z.object({
  content: z.string(),
  regions: z.array(clickableRegionSchema).nullish().transform((regions) => regions ?? []),
  total_lines: intField.nonnegative().default(0),
  sequence_num: intField.nonnegative().default(0),
  is_touch_mode: z.boolean().default(false),
  width: intField.nonnegative().default(0),
  height: intField.nonnegative().default(0),
  viewport_offset: intField.nonnegative().optional(),
  sidebar_bg: z.string().optional(),
  terminal_bg: z.string().optional(),
});

export type RenderPayload = z.infer<typeof renderPayloadSchema>;

/**
 * What a content provider hands back. The server stamps `sequence_num` and fills
 * the geometry from the client record when the provider leaves it out.
 */
export interface RenderFrame {
  content: string;
  regions?: readonly ClickableRegion[];
  total_lines?: number;
  is_touch_mode?: boolean;
  width?: number;
  height?: number;
  viewport_offset?: number;
  sidebar_bg?: string;
  terminal_bg?: string;
}

export const menuItemSchema = z.object({
  label: z.string(),
  key: z.string().optional(),
  separator: z.boolean().optional(),
  header: z.boolean().optional(),
});

export type MenuItemPayload = z.infer<typeof menuItemSchema>;

export const menuPayloadSchema = z.object({
  title: z.string().default(''),
  x: intField.default(0),
  y: intField.default(0),
  items: z.array(menuItemSchema).nullish().transform((items) => items ?? []),
});

export type MenuPayload = z.infer<typeof menuPayloadSchema>;

export const INPUT_TYPES = ['action', 'key', 'menu_select'] as const;

export type InputType = (typeof INPUT_TYPES)[number];

export const inputPayloadSchema = z.object({
  sequence_num: intField.nonnegative().default(0),
  type: z.enum(INPUT_TYPES),
  mouse_x: intField.default(0),
  mouse_y: intField.default(0),
  button: z.string().default(''),
  action: z.string().default(''),
  key: z.string().optional(),
  viewport_offset: intField.nonnegative().default(0),
  resolved_action: z.string().default(''),
  resolved_target: z.string().default(''),
  pane_id: z.string().default(''),
  is_simulated_right_click: z.boolean().default(false),
  is_touch_mode: z.boolean().default(false),
});

export type InputPayload = z.infer<typeof inputPayloadSchema>;

export const subscribePayloadSchema = z.object({
  width: intField.default(0),
  height: intField.default(0),
  color_profile: z.string().optional(),
  pane_id: z.string().default(''),
});

export type SubscribePayload = z.infer<typeof subscribePayloadSchema>;

export const resizePayloadSchema = z.object({
  width: intField,
  height: intField,
  pane_id: z.string().default(''),
});

export type ResizePayload = z.infer<typeof resizePayloadSchema>;

export const viewportUpdatePayloadSchema = z.object({
  viewport_offset: intField.nonnegative(),
});

export type ViewportUpdatePayload = z.infer<typeof viewportUpdatePayloadSchema>;

const emptyPayloadSchema = z.object({});

type EmptyPayload = z.infer<typeof emptyPayloadSchema>;

export const MESSAGE_TYPES = [
  'subscribe',
  'unsubscribe',
  'resize',
  'viewport_update',
  'input',
  'render',
  'menu',
  'ping',
  'pong',
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

const envelopeSchema = z.object({
  type: z.enum(MESSAGE_TYPES),
  client_id: z.string().default(''),
  payload: z.unknown(),
});

interface Envelope<TType extends MessageType, TPayload> {
  type: TType;
  client_id: string;
  payload: TPayload;
}

export type SubscribeMessage = Envelope<'subscribe', SubscribePayload>;
export type UnsubscribeMessage = Envelope<'unsubscribe', EmptyPayload>;
export type ResizeMessage = Envelope<'resize', ResizePayload>;
export type ViewportUpdateMessage = Envelope<'viewport_update', ViewportUpdatePayload>;
export type InputMessage = Envelope<'input', InputPayload>;
export type PingMessage = Envelope<'ping', EmptyPayload>;
export type RenderMessage = Envelope<'render', RenderPayload>;
export type MenuMessage = Envelope<'menu', MenuPayload>;
export type PongMessage = Envelope<'pong', EmptyPayload>;

export type ClientMessage =
  | SubscribeMessage
  | UnsubscribeMessage
  | ResizeMessage
  | ViewportUpdateMessage
  | InputMessage
  | PingMessage;

export type ServerMessage = RenderMessage | MenuMessage | PongMessage;

export type Message = ClientMessage | ServerMessage;

interface ConsumedJsonLines {
  messages: unknown[];
  remainder: string;
  invalidLines: number;
}

export function encodeRenderMessage(message: Message): string {
  return `${JSON.stringify(message)}\n`;
}

export function consumeJsonLines(buffer: string): ConsumedJsonLines {
  const lines = buffer.split('\n');
  const remainder = lines.pop() ?? '';
  const messages: unknown[] = [];
  let invalidLines = 0;

  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      continue;
    }
    try {
      messages.push(JSON.parse(trimmed));
    } catch {
      invalidLines += 1;
    }
  }

  return {
    messages,
    remainder,
    invalidLines,
  };
}

function decodePayload<TPayload>(
  schema: z.ZodType<TPayload, z.ZodTypeDef, unknown>,
  payload: unknown,
): TPayload | null {
  const result = schema.safeParse(payload ?? {});
  return result.success ? result.data : null;
}

function withPayload<TType extends MessageType, TPayload>(
  type: TType,
  clientId: string,
  payload: TPayload | null,
): Envelope<TType, TPayload> | null {
  if (payload === null) {
    return null;
  }
  return {
    type,
    client_id: clientId,
    payload,
  };
}

export function parseClientMessage(input: unknown): ClientMessage | null {
  const envelope = envelopeSchema.safeParse(input);
  if (!envelope.success) {
    return null;
  }
  const { type, client_id: clientId, payload } = envelope.data;
  switch (type) {
    case 'subscribe':
      return withPayload(type, clientId, decodePayload(subscribePayloadSchema, payload));
    case 'unsubscribe':
      return withPayload(type, clientId, decodePayload(emptyPayloadSchema, payload));
    case 'resize':
      return withPayload(type, clientId, decodePayload(resizePayloadSchema, payload));
    case 'viewport_update':
      return withPayload(type, clientId, decodePayload(viewportUpdatePayloadSchema, payload));
    case 'input':
      return withPayload(type, clientId, decodePayload(inputPayloadSchema, payload));
    case 'ping':
      return withPayload(type, clientId, decodePayload(emptyPayloadSchema, payload));
    default:
      return null;
  }
}

export function parseServerMessage(input: unknown): ServerMessage | null {
  const envelope = envelopeSchema.safeParse(input);
  if (!envelope.success) {
    return null;
  }
  const { type, client_id: clientId, payload } = envelope.data;
  switch (type) {
    case 'render':
      return withPayload(type, clientId, decodePayload(renderPayloadSchema, payload));
    case 'menu':
      return withPayload(type, clientId, decodePayload(menuPayloadSchema, payload));
    case 'pong':
      return withPayload(type, clientId, decodePayload(emptyPayloadSchema, payload));
    default:
      return null;
  }
}

function isColorProfile(value: string): value is ColorProfile {
  return COLOR_PROFILES.some((profile) => profile === value);
}

export function normalizeColorProfile(value: string | undefined): ColorProfile {
  if (value === undefined || !isColorProfile(value)) {
    return DEFAULT_COLOR_PROFILE;
  }
  return value;
}

export function colorProfileRank(profile: ColorProfile): number {
  return COLOR_PROFILES.indexOf(profile);
}

export function minColorProfile(profiles: Iterable<ColorProfile>): ColorProfile {
  let lowest: ColorProfile | null = null;
  for (const profile of profiles) {
    if (lowest === null || colorProfileRank(profile) < colorProfileRank(lowest)) {
      lowest = profile;
    }
  }
  return lowest ?? DEFAULT_COLOR_PROFILE;
}

export function isSelectableMenuItem(item: MenuItemPayload): boolean {
  return item.separator !== true && item.header !== true;
}
