export type TelegramChat = {
  id: number;
  type?: string;
};

export type TelegramUser = {
  id: number;
  username?: string;
};

type TelegramFileBase = {
  file_id: string;
  file_unique_id?: string;
  file_size?: number;
  mime_type?: string;
};

export type TelegramVoice = TelegramFileBase & {
  duration?: number;
};

export type TelegramAudio = TelegramFileBase & {
  duration?: number;
  file_name?: string;
};

export type TelegramDocument = TelegramFileBase & {
  file_name?: string;
};

export type TelegramMessage = {
  message_id: number;
  chat: TelegramChat;
  from?: TelegramUser;
  text?: string;
  voice?: TelegramVoice;
  audio?: TelegramAudio;
  document?: TelegramDocument;
};

export type TelegramCallbackQuery = {
  id: string;
  from: TelegramUser;
  message?: TelegramMessage;
  data?: string;
};

export type TelegramUpdate = {
  update_id: number;
  message?: TelegramMessage;
  callback_query?: TelegramCallbackQuery;
};

export type TelegramFile = {
  file_id: string;
  file_size?: number;
  file_path?: string;
};

export type TelegramInlineKeyboardButton = {
  text: string;
  callback_data: string;
};

export type TelegramReplyMarkup = {
  inline_keyboard: TelegramInlineKeyboardButton[][];
};

export type TelegramApiResponse<T> = {
  ok: boolean;
  result?: T;
  error_code?: number;
  description?: string;
};
