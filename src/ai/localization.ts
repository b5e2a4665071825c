// src/ai/localization.ts
// Output language for every user-facing string the analysis layer emits.
//
// Components look strings up in tables keyed by Language instead of
// branching on the language inline.

export type Language = 'english' | 'hindi';

export const DEFAULT_LANGUAGE: Language = 'english';

export type LocalizedText = Readonly<Record<Language, string>>;

const LANGUAGE_ALIASES: Readonly<Record<string, Language>> = {
  english: 'english',
  en: 'english',
  'en-in': 'english',
  hindi: 'hindi',
  hi: 'hindi',
  'hi-in': 'hindi',
  'हिंदी': 'hindi',
  'हिंदी (hindi)': 'hindi',
};

/**
 * Accepts the labels clients send ("English", "hi", "हिंदी (Hindi)", ...).
 * Anything unrecognized maps to English.
 */
export function parseLanguage(raw: unknown): Language {
  if (typeof raw !== 'string') return DEFAULT_LANGUAGE;
  return LANGUAGE_ALIASES[raw.trim().toLowerCase()] ?? DEFAULT_LANGUAGE;
}

export function localize(text: LocalizedText, language: Language): string {
  return text[language];
}

/** Instruction prepended to prompts when the output must be in Hindi. */
export const OUTPUT_LANGUAGE_INSTRUCTION: LocalizedText = {
  english: '',
  hindi:
    'Write all JSON string values in Hindi (Devanagari script). Keep JSON keys in English.',
};

/* ============= Entity extractor placeholders ============= */

export const NO_PARTIES_FOUND: LocalizedText = {
  english: 'Unable to identify parties',
  hindi: 'पक्षों की पहचान नहीं हो सकी',
};

export const NO_DATES_FOUND: LocalizedText = {
  english: 'No dates found',
  hindi: 'कोई तिथि नहीं मिली',
};

export const NO_AMOUNTS_FOUND: LocalizedText = {
  english: 'No financial terms found',
  hindi: 'कोई राशि नहीं मिली',
};

export const GENERAL_TERMS_CLAUSE: Readonly<{ type: LocalizedText; explanation: LocalizedText }> = {
  type: {
    english: 'General Contract Terms',
    hindi: 'सामान्य अनुबंध शर्तें',
  },
  explanation: {
    english:
      'Standard contractual terms detected. Review recommended to ensure fairness to both parties.',
    hindi:
      'अनुबंध में मानक शर्तें पाई गई हैं। दोनों पक्षों के लिए निष्पक्षता सुनिश्चित करने के लिए समीक्षा अनुशंसित है।',
  },
};

/* ============= Analysis defaults ============= */

export const ACT_NAMES: Readonly<Record<'contractAct' | 'itAct', LocalizedText>> = {
  contractAct: {
    english: 'Indian Contract Act 1872',
    hindi: 'भारतीय संविदा अधिनियम 1872',
  },
  itAct: {
    english: 'Information Technology Act 2000',
    hindi: 'सूचना प्रौद्योगिकी अधिनियम 2000',
  },
};

/** Model answered but the response could not be repaired. */
export const ANALYSIS_INCOMPLETE: Readonly<Record<'label' | 'detail' | 'recommendation', LocalizedText>> = {
  label: {
    english: 'Analysis Incomplete',
    hindi: 'विश्लेषण अधूरा',
  },
  detail: {
    english: 'Response could not be parsed. Please try again.',
    hindi: 'प्रतिक्रिया पढ़ी नहीं जा सकी। कृपया पुनः प्रयास करें।',
  },
  recommendation: {
    english: 'Re-run analysis or consult a legal professional',
    hindi: 'विश्लेषण फिर से चलाएँ या किसी कानूनी विशेषज्ञ से परामर्श लें',
  },
};

export const RISK_ON_ERROR: Readonly<Record<'category' | 'description', LocalizedText>> = {
  category: {
    english: 'Fallback',
    hindi: 'डिफ़ॉल्ट',
  },
  description: {
    english: 'Risk analysis failed and default values were used.',
    hindi: 'जोखिम विश्लेषण विफल रहा और डिफ़ॉल्ट मान उपयोग किए गए।',
  },
};

export const COMPLIANCE_ON_ERROR: Readonly<
  Record<'law' | 'issue' | 'reviewRecommendation' | 'contractActRecommendation' | 'regulationsRecommendation', LocalizedText>
> = {
  law: {
    english: 'General Review Required',
    hindi: 'सामान्य समीक्षा आवश्यक',
  },
  issue: {
    english: 'Automated compliance check encountered an error. Manual legal review is recommended.',
    hindi: 'स्वचालित अनुपालन जाँच में त्रुटि हुई। कानूनी विशेषज्ञ से समीक्षा कराने की सलाह दी जाती है।',
  },
  reviewRecommendation: {
    english: 'Have the contract reviewed by a qualified legal professional',
    hindi: 'अनुबंध की समीक्षा किसी योग्य कानूनी विशेषज्ञ से कराएँ',
  },
  contractActRecommendation: {
    english: 'Verify all clauses comply with Indian Contract Act 1872',
    hindi: 'सुनिश्चित करें कि सभी खंड भारतीय संविदा अधिनियम 1872 के अनुरूप हैं',
  },
  regulationsRecommendation: {
    english: 'Ensure compliance with applicable labor and industry-specific regulations',
    hindi: 'लागू श्रम और उद्योग-विशिष्ट नियमों का पालन सुनिश्चित करें',
  },
};

/** Labels for items the model returned without one. */
export const MISSING_LABELS: Readonly<Record<'riskCategory' | 'law', LocalizedText>> = {
  riskCategory: {
    english: 'General',
    hindi: 'सामान्य',
  },
  law: {
    english: 'Unspecified',
    hindi: 'अनिर्दिष्ट',
  },
};

export type ClauseDetailText = Readonly<
  Record<'explanation' | 'issues' | 'recommendations' | 'applicable_laws', LocalizedText>
>;

/** Per-field defaults for a clause detail answer with missing keys. */
export const CLAUSE_DETAIL_DEFAULTS: ClauseDetailText = {
  explanation: {
    english: 'Unable to generate detailed explanation',
    hindi: 'विस्तृत व्याख्या तैयार नहीं हो सकी',
  },
  issues: {
    english: 'No specific issues identified',
    hindi: 'कोई विशेष समस्या नहीं मिली',
  },
  recommendations: {
    english: 'No recommendations available',
    hindi: 'कोई सुझाव उपलब्ध नहीं',
  },
  applicable_laws: {
    english: 'No specific laws referenced',
    hindi: 'किसी विशेष कानून का उल्लेख नहीं',
  },
};

export const CLAUSE_DETAIL_UNPARSEABLE: ClauseDetailText = {
  explanation: {
    english: 'Unable to generate detailed explanation at this time.',
    hindi: 'इस समय विस्तृत व्याख्या तैयार नहीं हो सकी।',
  },
  issues: {
    english: 'Analysis could not be completed. Please try again.',
    hindi: 'विश्लेषण पूरा नहीं हो सका। कृपया पुनः प्रयास करें।',
  },
  recommendations: {
    english: 'Consult a legal professional for detailed review.',
    hindi: 'विस्तृत समीक्षा के लिए किसी कानूनी विशेषज्ञ से परामर्श लें।',
  },
  applicable_laws: {
    english: 'Not available due to analysis error.',
    hindi: 'विश्लेषण त्रुटि के कारण उपलब्ध नहीं।',
  },
};

/** explanation is a prefix; the error message follows it. */
export const CLAUSE_DETAIL_ON_ERROR: ClauseDetailText = {
  explanation: {
    english: 'Unable to generate detailed analysis. Error: ',
    hindi: 'विस्तृत विश्लेषण तैयार नहीं हो सका। त्रुटि: ',
  },
  issues: {
    english: 'Analysis could not be completed at this time.',
    hindi: 'इस समय विश्लेषण पूरा नहीं हो सका।',
  },
  recommendations: {
    english: 'Please try again or consult a legal professional.',
    hindi: 'कृपया पुनः प्रयास करें या किसी कानूनी विशेषज्ञ से परामर्श लें।',
  },
  applicable_laws: {
    english: 'Not available due to analysis error.',
    hindi: 'विश्लेषण त्रुटि के कारण उपलब्ध नहीं।',
  },
};
