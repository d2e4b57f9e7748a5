const V3_API_KEY = /^[a-zA-Z0-9]{32}$/;
const V4_ACCESS_TOKEN = /^eyJ[\w-]+\.[\w-]+\.[\w-]+$/;

/** True for a v3 API key or a v4 read access token. */
export function isRecognizedApiKey(apiKey: string): boolean {
    return V3_API_KEY.test(apiKey) || V4_ACCESS_TOKEN.test(apiKey);
}

/** v4 read access tokens go in a bearer header instead of the api_key parameter. */
export function isAccessToken(apiKey: string): boolean {
    return V4_ACCESS_TOKEN.test(apiKey);
}
