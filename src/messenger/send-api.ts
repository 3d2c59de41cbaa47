import { ConfigurationError } from '../core/errors.js';
import {
  MESSAGES_PATH,
  MESSAGE_ATTACHMENTS_PATH,
  type GraphTransport,
} from '../core/graph-transport.js';
import { logger } from '../middleware/logger.js';
import {
  buildAttachmentUpload,
  buildButtonTemplate,
  buildCallButtonTemplate,
  buildGenericElement,
  buildGenericTemplate,
  buildImageWithQuickReplies,
  buildListTemplate,
  buildMediaMessage,
  buildMediaTemplate,
  buildMessageRequest,
  buildReceiptTemplate,
  buildSavedAttachmentMessage,
  buildSenderAction,
  buildTemplateMessage,
  buildTextMessage,
  type ButtonTemplateInput,
  type CarouselOptions,
  type GenericTemplateInput,
  type ListTemplateOptions,
  type ReceiptTemplateInput,
} from './payloads.js';
import type {
  AttachmentType,
  GenericElement,
  ListElement,
  MediaElement,
  Message,
  QuickReply,
  SendOptions,
  SenderAction,
  TemplatePayload,
} from './types.js';

export interface AttachmentOptions extends SendOptions {
  /** Ask the platform for an `attachment_id` that can be resent later. */
  isReusable?: boolean;
}

/** Send API: everything posted to `me/messages`, plus attachment upload. */
export interface SendApi {
  /** Typing indicator or read receipt. Typing turns itself off after 20s. */
  postSenderAction(recipientId: string, action: SenderAction): Promise<Response>;

  /** Text up to 640 characters. */
  postTextMessage(recipientId: string, text: string, options?: SendOptions): Promise<Response>;

  /**
   * One text message per item, sent in order. A send that rejects is recorded
   * and the rest still go out; nothing already sent is undone.
   */
  postTextList(
    recipientId: string,
    texts?: string[],
    options?: SendOptions,
  ): Promise<PromiseSettledResult<Response>[]>;

  postAttachment(
    recipientId: string,
    mediaUrl: string,
    fileType: AttachmentType,
    options?: AttachmentOptions,
  ): Promise<Response>;
  postImageAttachment(recipientId: string, imageUrl: string, options?: AttachmentOptions): Promise<Response>;
  postAudioAttachment(recipientId: string, audioUrl: string, options?: AttachmentOptions): Promise<Response>;
  postVideoAttachment(recipientId: string, videoUrl: string, options?: AttachmentOptions): Promise<Response>;
  postFileAttachment(recipientId: string, fileUrl: string, options?: AttachmentOptions): Promise<Response>;

  /** The response body carries the `attachment_id` to pass to `postReusableAttachment`. */
  uploadReusableAttachment(mediaUrl: string, fileType: AttachmentType): Promise<Response>;
  postReusableAttachment(
    recipientId: string,
    attachmentId: string,
    fileType: AttachmentType,
    options?: SendOptions,
  ): Promise<Response>;

  postTextWithQuickReplies(
    recipientId: string,
    text: string,
    quickReplies: QuickReply[],
    options?: SendOptions,
  ): Promise<Response>;
  postImageWithQuickReplies(
    recipientId: string,
    imageUrl: string,
    quickReplies: QuickReply[],
    options?: SendOptions,
  ): Promise<Response>;
  postTemplateWithQuickReplies(
    recipientId: string,
    payload: TemplatePayload,
    quickReplies: QuickReply[],
    options?: SendOptions,
  ): Promise<Response>;

  postButtonTemplate(recipientId: string, input: ButtonTemplateInput, options?: SendOptions): Promise<Response>;
  /** A generic template with a single element. */
  postGenericTemplate(recipientId: string, input: GenericTemplateInput, options?: SendOptions): Promise<Response>;
  /** Up to 10 generic elements shown as a horizontal carousel. */
  postGenericTemplateCarousel(
    recipientId: string,
    elements: GenericElement[],
    options?: CarouselOptions & SendOptions,
  ): Promise<Response>;
  /** 2-4 elements. */
  postListTemplate(
    recipientId: string,
    elements: ListElement[],
    options?: ListTemplateOptions & SendOptions,
  ): Promise<Response>;
  postReceiptTemplate(recipientId: string, input: ReceiptTemplateInput, options?: SendOptions): Promise<Response>;
  postMediaTemplate(recipientId: string, elements: MediaElement[], options?: SendOptions): Promise<Response>;
  postCallButton(
    recipientId: string,
    text: string,
    title: string,
    phoneNumber: string,
    options?: SendOptions,
  ): Promise<Response>;
}

export function createSendApi(transport: GraphTransport): SendApi {
  function send(recipientId: string, message: Message, options?: SendOptions): Promise<Response> {
    return transport.post(MESSAGES_PATH, buildMessageRequest(recipientId, message, options));
  }

  function postAttachment(
    recipientId: string,
    mediaUrl: string,
    fileType: AttachmentType,
    options: AttachmentOptions = {},
  ): Promise<Response> {
    return send(recipientId, buildMediaMessage(mediaUrl, fileType, options.isReusable), options);
  }

  return {
    postSenderAction(recipientId, action) {
      return transport.post(MESSAGES_PATH, buildSenderAction(recipientId, action));
    },

    postTextMessage(recipientId, text, options) {
      return send(recipientId, buildTextMessage(text), options);
    },

    async postTextList(recipientId, texts = [], options) {
      const results: PromiseSettledResult<Response>[] = [];

      for (const [index, text] of texts.entries()) {
        try {
          const response = await send(recipientId, buildTextMessage(text), options);
          results.push({ status: 'fulfilled', value: response });
        } catch (err) {
          // No later send can succeed without a token
          if (err instanceof ConfigurationError) throw err;
          logger.warn({ err, index, total: texts.length }, 'Text list item failed to send');
          results.push({ status: 'rejected', reason: err });
        }
      }

      return results;
    },

    postAttachment,

    postImageAttachment(recipientId, imageUrl, options) {
      return postAttachment(recipientId, imageUrl, 'image', options);
    },

    postAudioAttachment(recipientId, audioUrl, options) {
      return postAttachment(recipientId, audioUrl, 'audio', options);
    },

    postVideoAttachment(recipientId, videoUrl, options) {
      return postAttachment(recipientId, videoUrl, 'video', options);
    },

    postFileAttachment(recipientId, fileUrl, options) {
      return postAttachment(recipientId, fileUrl, 'file', options);
    },

    uploadReusableAttachment(mediaUrl, fileType) {
      return transport.post(MESSAGE_ATTACHMENTS_PATH, buildAttachmentUpload(mediaUrl, fileType));
    },

    postReusableAttachment(recipientId, attachmentId, fileType, options) {
      return send(recipientId, buildSavedAttachmentMessage(attachmentId, fileType), options);
    },

    postTextWithQuickReplies(recipientId, text, quickReplies, options) {
      return send(recipientId, buildTextMessage(text, quickReplies), options);
    },

    postImageWithQuickReplies(recipientId, imageUrl, quickReplies, options) {
      return send(recipientId, buildImageWithQuickReplies(imageUrl, quickReplies), options);
    },

    postTemplateWithQuickReplies(recipientId, payload, quickReplies, options) {
      return send(recipientId, buildTemplateMessage(payload, quickReplies), options);
    },

    postButtonTemplate(recipientId, input, options) {
      return send(recipientId, buildTemplateMessage(buildButtonTemplate(input)), options);
    },

    postGenericTemplate(recipientId, input, options) {
      const payload = buildGenericTemplate([buildGenericElement(input)], input);
      return send(recipientId, buildTemplateMessage(payload), options);
    },

    postGenericTemplateCarousel(recipientId, elements, options = {}) {
      return send(recipientId, buildTemplateMessage(buildGenericTemplate(elements, options)), options);
    },

    postListTemplate(recipientId, elements, options = {}) {
      return send(recipientId, buildTemplateMessage(buildListTemplate(elements, options)), options);
    },

    postReceiptTemplate(recipientId, input, options) {
      return send(recipientId, buildTemplateMessage(buildReceiptTemplate(input)), options);
    },

    postMediaTemplate(recipientId, elements, options) {
      return send(recipientId, buildTemplateMessage(buildMediaTemplate(elements)), options);
    },

    postCallButton(recipientId, text, title, phoneNumber, options) {
      return send(recipientId, buildTemplateMessage(buildCallButtonTemplate(text, title, phoneNumber)), options);
    },
  };
}
