/**
 * INPUT: none
 * OUTPUT: intent labels, match types, pattern kinds, turn senders
 * POS: data model layer, enumerations shared across the query pipeline
 */

/** Intent labels, in classification priority order */
export enum IntentLabel {
  BELOTE_REBELOTE = 'belote_rebelote',
  HAND_EVALUATION = 'hand_evaluation',
  CAPOT = 'capot',
  ANNOUNCEMENTS = 'announcements',
  SCORING = 'scoring',
  CARDS = 'cards',
  COINCHE = 'coinche',
  PARTNER_POINTS = 'partner_points',
  CONTRACT_MANAGEMENT = 'contract_management',
  STRATEGY = 'strategy',
  BASIC = 'basic',
  GENERAL_HELP = 'general_help',
  GENERAL = 'general',
}

/** Which stage produced a match */
export enum MatchType {
  PATTERN = 'pattern',
  SEMANTIC = 'semantic',
  FUZZY = 'fuzzy',
}

/** Pattern families, evaluated in this order */
export enum PatternKind {
  HAND_EVALUATION = 'hand_evaluation',
  ANNOUNCEMENT_POINTS = 'announcement_points',
  BELOTE_REBELOTE = 'belote_rebelote',
  COINCHE = 'coinche',
  CAPOT = 'capot',
}

/** Responder selected by an announcement-points pattern */
export enum AnnouncementResponder {
  RECOMMENDATION = 'recommendation',
  CONDITIONS = 'conditions',
}

/** Author of a conversation turn */
export enum TurnSender {
  USER = 'user',
  SYSTEM = 'system',
}
