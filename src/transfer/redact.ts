const CREDENTIAL_RE = /^(https?:\/\/)([^@/]+)@/i;

export const redactUrl = (value: string) => value.replace(CREDENTIAL_RE, "$1***@");
