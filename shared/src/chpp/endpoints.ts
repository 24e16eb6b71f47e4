/** CHPP endpoint URLs and document catalogue */

export const CHPP_REQUEST_TOKEN_URL = 'https://chpp.hattrick.org/oauth/request_token.ashx'
export const CHPP_AUTHORIZE_URL = 'https://chpp.hattrick.org/oauth/authorize.aspx'
export const CHPP_ACCESS_TOKEN_URL = 'https://chpp.hattrick.org/oauth/access_token.ashx'
export const CHPP_DATA_URL = 'https://chpp.hattrick.org/chppxml.ashx'

/** Scopes requested during authorization (comma separated when more than one) */
export const CHPP_SCOPES = ['set_matchorder'] as const

// Legacy artifact of the API; the server expects this exact Accept list.
export const CHPP_ACCEPT_HEADER = 'image/gif, image/x-xbitmap, image/jpeg, image/pjpeg, */*'
export const CHPP_ACCEPT_LANGUAGE = 'en'

export const CHPP_DOCUMENTS = {
    worldDetails: { file: 'worlddetails', version: '1.9' },
    teamDetails: { file: 'teamdetails', version: '3.7' },
    players: { file: 'players', version: '2.4' },
    playerDetails: { file: 'playerdetails', version: '3.1' }
} as const

export type ChppDocumentKey = keyof typeof CHPP_DOCUMENTS
export type ChppDocumentName = (typeof CHPP_DOCUMENTS)[ChppDocumentKey]['file']
