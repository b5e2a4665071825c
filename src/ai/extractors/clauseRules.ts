// src/ai/extractors/clauseRules.ts
// Clause taxonomy for the rule-based extractor.
//
// Table order is output order. Risk levels here are part of the public
// contract; UI badges and downstream scoring read them.

import type { LocalizedText } from '../localization';
import type { RiskLevel } from '../../types/analysis';

export interface ClauseRule {
  /** Canonical English clause type */
  type: string;
  label: LocalizedText;
  /** Lowercase literal phrases; the first hit wins */
  phrases: readonly string[];
  riskLevel: RiskLevel;
  explanation: LocalizedText;
}

export const CLAUSE_RULES: readonly ClauseRule[] = [
  {
    type: 'Non-Compete',
    label: { english: 'Non-Compete', hindi: 'गैर-प्रतिस्पर्धा' },
    phrases: ['non-compete', 'non compete', 'restraint of trade', 'competing business'],
    riskLevel: 'High',
    explanation: {
      english:
        'Non-compete clause restricts future employment opportunities. May be unenforceable under Section 27 of the Indian Contract Act 1872.',
      hindi:
        'गैर-प्रतिस्पर्धा खंड भविष्य के रोजगार के अवसरों को सीमित करता है। भारतीय संविदा अधिनियम 1872 की धारा 27 के तहत यह अप्रवर्तनीय हो सकता है।',
    },
  },
  {
    type: 'Confidentiality',
    label: { english: 'Confidentiality', hindi: 'गोपनीयता' },
    phrases: ['confidential', 'proprietary information', 'trade secret'],
    riskLevel: 'Low',
    explanation: {
      english:
        'Confidentiality obligations for protecting sensitive information. Standard in most contracts but review scope and duration.',
      hindi:
        'संवेदनशील जानकारी की सुरक्षा के लिए गोपनीयता दायित्व। अधिकांश अनुबंधों में मानक, परंतु दायरे और अवधि की समीक्षा करें।',
    },
  },
  {
    type: 'Termination',
    label: { english: 'Termination', hindi: 'समाप्ति' },
    phrases: ['termination', 'terminate this agreement', 'notice period'],
    riskLevel: 'Medium',
    explanation: {
      english:
        'Termination provisions define how either party can end the contract. Review notice period requirements and consequences of termination.',
      hindi:
        'समाप्ति प्रावधान बताते हैं कि कोई भी पक्ष अनुबंध कैसे समाप्त कर सकता है। नोटिस अवधि की आवश्यकताओं और समाप्ति के परिणामों की समीक्षा करें।',
    },
  },
  {
    type: 'Indemnification',
    label: { english: 'Indemnification', hindi: 'क्षतिपूर्ति' },
    phrases: ['indemnify', 'indemnification', 'hold harmless'],
    riskLevel: 'High',
    explanation: {
      english:
        'Indemnification clause may expose one party to unlimited financial liability. Ensure liability caps and mutual indemnification exist.',
      hindi:
        'क्षतिपूर्ति खंड किसी एक पक्ष को असीमित वित्तीय दायित्व में डाल सकता है। सुनिश्चित करें कि दायित्व सीमा और पारस्परिक क्षतिपूर्ति मौजूद हो।',
    },
  },
  {
    type: 'Intellectual Property',
    label: { english: 'Intellectual Property', hindi: 'बौद्धिक संपदा' },
    phrases: ['intellectual property', 'ip rights', 'patents', 'copyrights'],
    riskLevel: 'Medium',
    explanation: {
      english:
        'IP assignment clause transfers ownership of created work. Verify scope does not extend to personal or pre-existing IP.',
      hindi:
        'बौद्धिक संपदा हस्तांतरण खंड सृजित कार्य का स्वामित्व स्थानांतरित करता है। सुनिश्चित करें कि दायरा व्यक्तिगत या पूर्व-मौजूदा बौद्धिक संपदा तक न फैले।',
    },
  },
  {
    type: 'Arbitration',
    label: { english: 'Arbitration', hindi: 'मध्यस्थता' },
    phrases: ['arbitration', 'dispute resolution', 'arbitrator'],
    riskLevel: 'Medium',
    explanation: {
      english:
        'Dispute resolution through arbitration. Review jurisdiction, arbitrator selection process, and cost-sharing provisions.',
      hindi:
        'मध्यस्थता के माध्यम से विवाद समाधान। क्षेत्राधिकार, मध्यस्थ चयन प्रक्रिया और लागत-साझाकरण प्रावधानों की समीक्षा करें।',
    },
  },
  {
    type: 'Force Majeure',
    label: { english: 'Force Majeure', hindi: 'अप्रत्याशित घटना' },
    phrases: ['force majeure', 'act of god', 'unforeseen circumstances'],
    riskLevel: 'Low',
    explanation: {
      english:
        'Force majeure clause covers unforeseen events. Standard provision but verify what events are covered and notice requirements.',
      hindi:
        'अप्रत्याशित घटना खंड अनपेक्षित घटनाओं को कवर करता है। मानक प्रावधान है, परंतु शामिल घटनाओं और नोटिस आवश्यकताओं की पुष्टि करें।',
    },
  },
  {
    type: 'Payment Terms',
    label: { english: 'Payment Terms', hindi: 'भुगतान शर्तें' },
    phrases: ['payment', 'salary', 'compensation', 'remuneration', 'wages'],
    riskLevel: 'Medium',
    explanation: {
      english:
        'Payment and compensation terms. Verify payment frequency, deductions, and compliance with Payment of Wages Act.',
      hindi:
        'भुगतान और पारिश्रमिक की शर्तें। भुगतान की आवृत्ति, कटौतियों और मजदूरी भुगतान अधिनियम के अनुपालन की पुष्टि करें।',
    },
  },
  {
    type: 'Liability Limitation',
    label: { english: 'Liability Limitation', hindi: 'दायित्व सीमा' },
    phrases: ['limitation of liability', 'liability cap', 'maximum liability', 'aggregate liability'],
    riskLevel: 'High',
    explanation: {
      english:
        'Liability limitation caps financial exposure. Verify caps are reasonable and do not unfairly disadvantage one party.',
      hindi:
        'दायित्व सीमा खंड वित्तीय जोखिम को सीमित करता है। पुष्टि करें कि सीमाएँ उचित हैं और किसी एक पक्ष को अनुचित रूप से नुकसान नहीं पहुँचातीं।',
    },
  },
  {
    type: 'Renewal / Lock-in',
    label: { english: 'Renewal / Lock-in', hindi: 'नवीनीकरण / लॉक-इन' },
    phrases: ['auto-renewal', 'lock-in', 'lock in', 'minimum term', 'auto renewal'],
    riskLevel: 'High',
    explanation: {
      english:
        'Auto-renewal or lock-in period restricts ability to exit the contract. Review duration and opt-out provisions carefully.',
      hindi:
        'स्वतः नवीनीकरण या लॉक-इन अवधि अनुबंध से बाहर निकलने की क्षमता को सीमित करती है। अवधि और बाहर निकलने के प्रावधानों की सावधानीपूर्वक समीक्षा करें।',
    },
  },
];
