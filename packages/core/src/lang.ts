// Script-range hinting only; no statistical detection.

const RTL_LANGUAGES = new Set(["he", "iw", "ar", "fa", "ur", "yi", "ps", "sd", "ug", "dv", "ckb"]);

// Hebrew, Arabic (incl. supplements), Syriac, Thaana, presentation forms
const RTL_SCRIPT = /[\u0590-\u05FF\u0600-\u06FF\u0700-\u074F\u0750-\u077F\u0780-\u07BF\u08A0-\u08FF\uFB1D-\uFDFF\uFE70-\uFEFF]/;

export function primarySubtag(lang: string): string {
  return lang.trim().toLowerCase().split(/[-_]/)[0] ?? "";
}

export function isRtlLanguage(lang: string | undefined): boolean {
  if (!lang) return false;
  return RTL_LANGUAGES.has(primarySubtag(lang));
}

export function hasRtlScript(text: string): boolean {
  return RTL_SCRIPT.test(text.slice(0, 2000));
}

export function sameLanguage(a: string, b: string): boolean {
  return primarySubtag(a) === primarySubtag(b);
}
