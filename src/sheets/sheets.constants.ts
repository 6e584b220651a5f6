export const SPREADSHEET_GATEWAY = Symbol('SPREADSHEET_GATEWAY');

export const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

export const VALUE_INPUT_OPTION = 'USER_ENTERED';
