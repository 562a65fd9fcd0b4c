// Montreal borough codes as they appear in the geobase ARR field

export const BOROUGHS: Readonly<Record<string, string>> = {
  AHU: 'Ahuntsic-Cartierville',
  ANJ: 'Anjou',
  CDN: 'Côte-des-Neiges–Notre-Dame-de-Grâce',
  LAC: 'Lachine',
  LAS: 'LaSalle',
  PLA: 'Le Plateau-Mont-Royal',
  LSO: 'Le Sud-Ouest',
  MHM: 'Mercier–Hochelaga-Maisonneuve',
  MTN: 'Montréal-Nord',
  OUT: 'Outremont',
  PRF: 'Pierrefonds-Roxboro',
  RDP: 'Rivière-des-Prairies–Pointe-aux-Trembles',
  RPP: 'Rosemont–La Petite-Patrie',
  VSL: 'Saint-Laurent',
  STL: 'Saint-Léonard',
  VER: 'Verdun',
  VIM: 'Ville-Marie',
  VSE: 'Villeray–Saint-Michel–Parc-Extension',
};

/**
 * Expand a borough code to its name. Values that are not a known code
 * (already a full name, or empty) are returned trimmed.
 */
export function resolveBorough(value: string): string {
  const trimmed = value.trim();
  return BOROUGHS[trimmed.toUpperCase()] ?? trimmed;
}
