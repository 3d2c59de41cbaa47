import type {
  AttachmentType,
  AttachmentUploadRequest,
  AudienceType,
  Button,
  ButtonTemplatePayload,
  DefaultAction,
  GenericElement,
  GenericTemplatePayload,
  GreetingText,
  HomeUrl,
  ImageAspectRatio,
  ListElement,
  ListTemplatePayload,
  MediaElement,
  MediaTemplatePayload,
  Message,
  MessageRequest,
  PaymentSettings,
  PersistentMenu,
  QuickReply,
  ReceiptAddress,
  ReceiptAdjustment,
  ReceiptElement,
  ReceiptSummary,
  ReceiptTemplatePayload,
  SendOptions,
  SenderAction,
  SenderActionRequest,
  TargetCountries,
  TemplatePayload,
} from './types.js';

export const DEFAULT_START_PAYLOAD = 'START';
export const SETTINGS_START_PAYLOAD = 'USER_START';
export const USER_PROFILE_FIELDS = ['name', 'first_name', 'last_name', 'profile_pic'] as const;

/**
 * Optional strings count as empty when blank after trimming. This holds for
 * every optional string field, so a whitespace-only `image_url`, `subtitle`
 * or `merchant_name` is omitted rather than sent as-is.
 */
function hasText(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function hasItems<T>(value: T[] | null | undefined): value is T[] {
  return Array.isArray(value) && value.length > 0;
}

/** `sharable` defaults to true on the platform, so only the opt-out is written. */
function sharableField(sharable: boolean | undefined): { sharable?: false } {
  return sharable === false ? { sharable: false } : {};
}

function aspectRatioField(ratio: ImageAspectRatio | undefined): { image_aspect_ratio?: 'square' } {
  return ratio && ratio !== 'horizontal' ? { image_aspect_ratio: 'square' } : {};
}

// ── Send API ────────────────────────────────────────────────────────────

/**
 * Wrap a message in the Send API envelope. `tag` is written when one is
 * supplied or when the messaging type requires it (as `null` if missing);
 * otherwise the key is left out.
 */
export function buildMessageRequest(
  recipientId: string,
  message: Message,
  options: SendOptions = {},
): MessageRequest {
  const messagingType = options.messagingType ?? 'RESPONSE';
  const includeTag = Boolean(options.tag) || messagingType === 'MESSAGE_TAG';

  return {
    recipient: { id: recipientId },
    messaging_type: messagingType,
    ...(includeTag ? { tag: options.tag ?? null } : {}),
    message,
  };
}

export function buildSenderAction(recipientId: string, action: SenderAction): SenderActionRequest {
  return {
    recipient: { id: recipientId },
    sender_action: action,
  };
}

export function buildTextMessage(text: string, quickReplies?: QuickReply[]): Message {
  return quickReplies ? { text, quick_replies: quickReplies } : { text };
}

export function buildMediaMessage(
  mediaUrl: string,
  fileType: AttachmentType,
  isReusable = false,
): Message {
  return {
    attachment: {
      type: fileType,
      payload: isReusable ? { url: mediaUrl, is_reusable: true } : { url: mediaUrl },
    },
  };
}

export function buildSavedAttachmentMessage(attachmentId: string, fileType: AttachmentType): Message {
  return {
    attachment: {
      type: fileType,
      payload: { attachment_id: attachmentId },
    },
  };
}

export function buildAttachmentUpload(mediaUrl: string, fileType: AttachmentType): AttachmentUploadRequest {
  return {
    message: {
      attachment: {
        type: fileType,
        payload: { url: mediaUrl, is_reusable: true },
      },
    },
  };
}

export function buildTemplateMessage(payload: TemplatePayload, quickReplies?: QuickReply[]): Message {
  const attachment = { type: 'template' as const, payload };
  return quickReplies ? { attachment, quick_replies: quickReplies } : { attachment };
}

export function buildImageWithQuickReplies(imageUrl: string, quickReplies: QuickReply[]): Message {
  return {
    attachment: { type: 'image', payload: { url: imageUrl } },
    quick_replies: quickReplies,
  };
}

export interface ButtonTemplateInput {
  /** 640 character limit. */
  text: string;
  /** 1-3 buttons. */
  buttons: Button[];
  sharable?: boolean;
}

export function buildButtonTemplate(input: ButtonTemplateInput): ButtonTemplatePayload {
  return {
    template_type: 'button',
    text: input.text,
    buttons: input.buttons,
    ...sharableField(input.sharable),
  };
}

export interface GenericTemplateInput {
  title: string;
  /** Omitted when empty or whitespace-only. */
  imageUrl?: string | null;
  /** Omitted when empty or whitespace-only. */
  subtitle?: string | null;
  buttons?: Button[] | null;
  defaultAction?: DefaultAction | null;
  sharable?: boolean;
  imageAspectRatio?: ImageAspectRatio;
}

export function buildGenericElement(input: GenericTemplateInput): GenericElement {
  return {
    title: input.title,
    ...(hasText(input.imageUrl) ? { image_url: input.imageUrl } : {}),
    ...(hasText(input.subtitle) ? { subtitle: input.subtitle } : {}),
    ...(hasItems(input.buttons) ? { buttons: input.buttons } : {}),
    ...(input.defaultAction ? { default_action: input.defaultAction } : {}),
  };
}

export interface CarouselOptions {
  sharable?: boolean;
  imageAspectRatio?: ImageAspectRatio;
}

export function buildGenericTemplate(
  elements: GenericElement[],
  options: CarouselOptions = {},
): GenericTemplatePayload {
  return {
    template_type: 'generic',
    elements,
    ...sharableField(options.sharable),
    ...aspectRatioField(options.imageAspectRatio),
  };
}

export interface ListTemplateOptions {
  /** A single button shown below the list. */
  buttons?: Button[] | null;
  topElementStyle?: 'large' | 'compact';
  sharable?: boolean;
}

export function buildListTemplate(
  elements: ListElement[],
  options: ListTemplateOptions = {},
): ListTemplatePayload {
  return {
    template_type: 'list',
    top_element_style: options.topElementStyle ?? 'large',
    ...(hasItems(options.buttons) ? { buttons: options.buttons } : {}),
    elements,
    ...sharableField(options.sharable),
  };
}

export interface ReceiptTemplateInput {
  recipientName: string;
  /** Must be unique per order. */
  orderNumber: string;
  currency: string;
  paymentMethod: string;
  summary: ReceiptSummary;
  /** Shown as logo text; omitted when empty or whitespace-only. */
  merchantName?: string | null;
  /** Unix timestamp of the order, in seconds, as a string. */
  timestamp?: string | null;
  orderUrl?: string | null;
  elements?: ReceiptElement[] | null;
  address?: ReceiptAddress | null;
  adjustments?: ReceiptAdjustment[] | null;
  sharable?: boolean;
}

export function buildReceiptTemplate(input: ReceiptTemplateInput): ReceiptTemplatePayload {
  return {
    template_type: 'receipt',
    recipient_name: input.recipientName,
    order_number: input.orderNumber,
    currency: input.currency,
    payment_method: input.paymentMethod,
    summary: input.summary,
    ...(hasText(input.orderUrl) ? { order_url: input.orderUrl } : {}),
    ...(hasText(input.timestamp) ? { timestamp: input.timestamp } : {}),
    ...(hasItems(input.elements) ? { elements: input.elements } : {}),
    ...(input.address ? { address: input.address } : {}),
    ...(hasItems(input.adjustments) ? { adjustments: input.adjustments } : {}),
    ...(hasText(input.merchantName) ? { merchant_name: input.merchantName } : {}),
    ...sharableField(input.sharable),
  };
}

export function buildMediaTemplate(elements: MediaElement[]): MediaTemplatePayload {
  return { template_type: 'media', elements };
}

export function buildCallButtonTemplate(text: string, title: string, phoneNumber: string): ButtonTemplatePayload {
  return buildButtonTemplate({
    text,
    buttons: [{ type: 'phone_number', title, payload: phoneNumber }],
  });
}

// ── Messenger profile API ───────────────────────────────────────────────

export function buildLegacyGreeting(text: string): { setting_type: 'greeting'; greeting: { text: string } } {
  return { setting_type: 'greeting', greeting: { text } };
}

export function buildGreeting(greetings: GreetingText[]): { greeting: GreetingText[] } {
  return { greeting: greetings };
}

export function buildStartButton(payload: string = DEFAULT_START_PAYLOAD): { get_started: { payload: string } } {
  return { get_started: { payload } };
}

export function buildPersistentMenu(menus: PersistentMenu[]): { persistent_menu: PersistentMenu[] } {
  return { persistent_menu: menus };
}

export function buildDomainWhitelist(domains: string[]): { whitelisted_domains: string[] } {
  return { whitelisted_domains: domains };
}

export function buildDomainWhitelistRemoval(): { fields: ['whitelisted_domains'] } {
  return { fields: ['whitelisted_domains'] };
}

export function buildAccountLinkingUrl(url: string): { account_linking_url: string } {
  return { account_linking_url: url };
}

export interface PaymentSettingsInput {
  privacyUrl?: string | null;
  publicKey?: string | null;
  /** Page-scoped ids of users whose cards are not charged. */
  testUsers?: string[] | null;
}

/** Returns `null` when no setting was supplied; callers must not send that. */
export function buildPaymentSettings(input: PaymentSettingsInput): { payment_settings: PaymentSettings } | null {
  const settings: PaymentSettings = {
    ...(hasText(input.privacyUrl) ? { privacy_url: input.privacyUrl } : {}),
    ...(hasText(input.publicKey) ? { public_key: input.publicKey } : {}),
    ...(hasItems(input.testUsers) ? { testers: input.testUsers } : {}),
  };

  if (Object.keys(settings).length === 0) return null;
  return { payment_settings: settings };
}

export function buildTargetAudience(
  countries: TargetCountries | null | undefined,
  audienceType: AudienceType = 'all',
): { target_audience: { audience_type: AudienceType; countries?: TargetCountries } } {
  const withCountries = audienceType === 'custom' || audienceType === 'none';
  return {
    target_audience: {
      audience_type: audienceType,
      ...(withCountries && countries ? { countries } : {}),
    },
  };
}

export interface HomeUrlOptions {
  webviewShareButton?: 'show' | 'hide';
  /** When true only admins, developers and testers see the extension. */
  inTest?: boolean;
}

export function buildHomeUrl(url: string, options: HomeUrlOptions = {}): { home_url: HomeUrl } {
  return {
    home_url: {
      url,
      webview_height_ratio: 'tall',
      webview_share_button: options.webviewShareButton ?? 'hide',
      in_test: options.inTest ?? true,
    },
  };
}

// ── User profile API ────────────────────────────────────────────────────

export function buildUserFields(extraFields: readonly string[] = []): string {
  return [...USER_PROFILE_FIELDS, ...extraFields].join(',');
}
