export interface CommandDescriptions {
  schedule: string;
  changes: string;
  help: string;
  parse: string;
  write: string;
  show: string;
  exit: string;
}

export type CommandKeyword = keyof CommandDescriptions;

export type LocaleTag = "en" | "ru" | "zh";

export const DESCRIPTIONS: Record<LocaleTag, CommandDescriptions> = {
  en: {
    schedule: "Begins schedule-reading process (requires prepared file)",
    changes: "Begins changes-reading process (requires downloaded document)",
    help: "Show context help for this application",
    parse: "Begins basic parsing process (may be useful for debugging process)",
    write: "Writes last gotten result value to file",
    show: "Show last gotten result in the console (terminal)",
    exit: "Exits from program",
  },
  ru: {
    schedule: "Начинает чтение расписания (требуется подготовленный файл)",
    changes: "Начинает чтение замен (требуется загруженный документ)",
    help: "Показать справку по приложению",
    parse: "Начинает базовый процесс разбора (может пригодиться для отладки)",
    write: "Записывает последний полученный результат в файл",
    show: "Показывает последний полученный результат в консоли (терминале)",
    exit: "Выход из программы",
  },
  zh: {
    schedule: "开始读取课程表（需要准备好的文件）",
    changes: "开始读取调课信息（需要已下载的文档）",
    help: "显示本应用的帮助",
    parse: "开始基本解析过程（可用于调试）",
    write: "将最后得到的结果写入文件",
    show: "在控制台（终端）中显示最后得到的结果",
    exit: "退出程序",
  },
};

/**
 * Map a system locale ("en_US.UTF-8", "en-GB", "zh_CN", ...) to one of the
 * supported tags. Anything unrecognised falls back to Russian.
 */
export function resolveLocale(tag: string): LocaleTag {
  const language = tag.trim().toLowerCase().split(/[-_.@]/)[0];
  if (language === "en") return "en";
  if (language === "zh") return "zh";
  return "ru";
}

export function getDescriptions(tag: string): CommandDescriptions {
  return DESCRIPTIONS[resolveLocale(tag)];
}
