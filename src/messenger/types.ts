/**
 * Wire types for the Messenger Platform Send and Messenger Profile APIs.
 *
 * Field names are snake_case because these objects are serialized verbatim.
 * Documented limits are the platform's; they are not checked locally.
 */

export type MessagingType = 'RESPONSE' | 'UPDATE' | 'MESSAGE_TAG';

export type SenderAction = 'typing_on' | 'typing_off' | 'mark_seen';

export type AttachmentType = 'image' | 'audio' | 'video' | 'file';

export type ImageAspectRatio = 'horizontal' | 'square';

export type WebviewHeightRatio = 'compact' | 'tall' | 'full';

export interface SendOptions {
  /** Defaults to `RESPONSE`. */
  messagingType?: MessagingType;
  /** Required by the platform when `messagingType` is `MESSAGE_TAG`. */
  tag?: string | null;
}

export interface Recipient {
  id: string;
}

// ── Buttons ─────────────────────────────────────────────────────────────

export interface WebUrlButton {
  type: 'web_url';
  title: string;
  url: string;
  webview_height_ratio?: WebviewHeightRatio;
  messenger_extensions?: boolean;
  fallback_url?: string;
  webview_share_button?: 'hide';
}

export interface PostbackButton {
  type: 'postback';
  title: string;
  payload: string;
}

export interface PhoneNumberButton {
  type: 'phone_number';
  title: string;
  /** Format must include the country code, e.g. `+16505551234`. */
  payload: string;
}

export interface ShareButton {
  type: 'element_share';
  share_contents?: TemplatePayload;
}

export interface LogInButton {
  type: 'account_link';
  url: string;
}

export interface LogOutButton {
  type: 'account_unlink';
}

export type Button =
  | WebUrlButton
  | PostbackButton
  | PhoneNumberButton
  | ShareButton
  | LogInButton
  | LogOutButton;

export interface DefaultAction {
  type: 'web_url';
  url: string;
  webview_height_ratio?: WebviewHeightRatio;
  messenger_extensions?: boolean;
  fallback_url?: string;
}

// ── Quick replies ───────────────────────────────────────────────────────

export interface TextQuickReply {
  content_type: 'text';
  /** 20 character limit. */
  title: string;
  /** 1000 character limit. */
  payload: string;
  image_url?: string;
}

export interface DataQuickReply {
  content_type: 'location' | 'user_phone_number' | 'user_email';
}

/** Up to 11 per message. */
export type QuickReply = TextQuickReply | DataQuickReply;

// ── Template elements ───────────────────────────────────────────────────

export interface GenericElement {
  /** 80 character limit. */
  title: string;
  /** 80 character limit. */
  subtitle?: string;
  image_url?: string;
  default_action?: DefaultAction;
  /** Up to 3 buttons. */
  buttons?: Button[];
}

export interface ListElement {
  title: string;
  subtitle?: string;
  image_url?: string;
  default_action?: DefaultAction;
  /** At most one button per list element. */
  buttons?: Button[];
}

export interface MediaElement {
  media_type: 'image' | 'video';
  url?: string;
  attachment_id?: string;
  buttons?: Button[];
}

export interface ReceiptSummary {
  subtotal?: number;
  shipping_cost?: number;
  total_tax?: number;
  total_cost: number;
}

export interface ReceiptElement {
  title: string;
  subtitle?: string;
  quantity?: number;
  price: number;
  currency?: string;
  image_url?: string;
}

export interface ReceiptAddress {
  street_1: string;
  street_2?: string;
  city: string;
  postal_code: string;
  state: string;
  country: string;
}

export interface ReceiptAdjustment {
  name: string;
  amount: number;
}

// ── Template payloads ───────────────────────────────────────────────────

export interface ButtonTemplatePayload {
  template_type: 'button';
  text: string;
  buttons: Button[];
  sharable?: false;
}

export interface GenericTemplatePayload {
  template_type: 'generic';
  elements: GenericElement[];
  sharable?: false;
  image_aspect_ratio?: 'square';
}

export interface ListTemplatePayload {
  template_type: 'list';
  top_element_style: 'large' | 'compact';
  elements: ListElement[];
  buttons?: Button[];
  sharable?: false;
}

export interface ReceiptTemplatePayload {
  template_type: 'receipt';
  recipient_name: string;
  order_number: string;
  currency: string;
  payment_method: string;
  summary: ReceiptSummary;
  merchant_name?: string;
  timestamp?: string;
  order_url?: string;
  elements?: ReceiptElement[];
  address?: ReceiptAddress;
  adjustments?: ReceiptAdjustment[];
  sharable?: false;
}

export interface MediaTemplatePayload {
  template_type: 'media';
  elements: MediaElement[];
}

export type TemplatePayload =
  | ButtonTemplatePayload
  | GenericTemplatePayload
  | ListTemplatePayload
  | ReceiptTemplatePayload
  | MediaTemplatePayload;

// ── Messages ────────────────────────────────────────────────────────────

export interface UrlAttachmentPayload {
  url: string;
  is_reusable?: true;
}

export interface SavedAttachmentPayload {
  attachment_id: string;
}

export interface MediaAttachment {
  type: AttachmentType;
  payload: UrlAttachmentPayload | SavedAttachmentPayload;
}

export interface TemplateAttachment {
  type: 'template';
  payload: TemplatePayload;
}

export type Attachment = MediaAttachment | TemplateAttachment;

export type Message =
  | { text: string; quick_replies?: QuickReply[] }
  | { attachment: Attachment; quick_replies?: QuickReply[] };

export interface MessageRequest {
  recipient: Recipient;
  messaging_type: MessagingType;
  tag?: string | null;
  message: Message;
}

export interface SenderActionRequest {
  recipient: Recipient;
  sender_action: SenderAction;
}

export interface AttachmentUploadRequest {
  message: { attachment: { type: AttachmentType; payload: { url: string; is_reusable: true } } };
}

// ── Messenger profile ───────────────────────────────────────────────────

export interface GreetingText {
  /** `default` plus any supported locale, e.g. `pt_BR`. */
  locale: string;
  /** 160 character limit; supports `{{user_first_name}}` style personalization. */
  text: string;
}

export type MenuItem =
  | { type: 'postback'; title: string; payload: string }
  | {
    type: 'web_url';
    title: string;
    url: string;
    webview_height_ratio?: WebviewHeightRatio;
    messenger_extensions?: boolean;
    fallback_url?: string;
    webview_share_button?: 'hide';
  }
  | { type: 'nested'; title: string; call_to_actions: MenuItem[] };

export interface PersistentMenu {
  locale: string;
  composer_input_disabled?: boolean;
  call_to_actions?: MenuItem[];
}

export type AudienceType = 'all' | 'custom' | 'none';

export interface TargetCountries {
  /** ISO 3166 Alpha-2 codes. */
  whitelist?: string[];
  blacklist?: string[];
}

export interface PaymentSettings {
  privacy_url?: string;
  public_key?: string;
  testers?: string[];
}

export interface HomeUrl {
  url: string;
  webview_height_ratio: 'tall';
  webview_share_button: 'show' | 'hide';
  in_test: boolean;
}
