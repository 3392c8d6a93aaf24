// Interview Assistant Bot - User-facing texts (Russian)

export const MESSAGES = {
  welcome: "Здравствуйте! Отправьте мне аудио интервью.",
  newConversation: "Начат новый разговор. Отправьте аудио интервью.",
  help:
    "Отправьте аудиозапись интервью (mp3, ogg, m4a, wav), и я подготовлю расшифровку. " +
    "После этого можно задавать вопросы по интервью текстом или голосом.\n\n" +
    "Команды:\n" +
    "/start — начать сначала\n" +
    "/new — новый разговор\n" +
    "/help — эта справка",
  audioReceived: "Аудио получено. Обрабатываю...",
  audioReady: "Аудио обработано. Можете задавать вопросы.",
  audioFailed: "Произошла ошибка при обработке аудио.",
  unsupportedAudio: "Неподдерживаемый формат аудио.",
  unsupportedMedia: "Я понимаю только аудио, голосовые и текстовые сообщения.",
  queryProcessing: "Обрабатываю ваш запрос...",
  queryAfterAudio: "Аудио обработано. Обрабатываю ваш запрос...",
  queryFailed: "Произошла ошибка при обработке вашего запроса.",
  voiceFailed: "Не удалось распознать голосовое сообщение.",
  unexpectedError: "Произошла непредвиденная ошибка. Попробуйте ещё раз.",
} as const;

/** The "send the audio first" notice; the count keeps each edit distinct. */
export function awaitingAudioNotice(queuedCount: number): string {
  const base = "Сначала отправьте аудио.";
  return queuedCount > 1
    ? `${base} Сохранено сообщений: ${queuedCount}. Отвечу на них после обработки аудио.`
    : `${base} Отвечу на ваше сообщение после обработки аудио.`;
}

export function unknownCommandNotice(command: string, suggestions: readonly string[]): string {
  if (suggestions.length === 0) {
    return `Неизвестная команда /${command}. Список команд: /help`;
  }
  const options = suggestions.map((s) => `/${s}`).join(", ");
  return `Неизвестная команда /${command}. Возможно, вы имели в виду: ${options}`;
}
