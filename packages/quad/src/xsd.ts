export const XSD_NAMESPACE = "http://www.w3.org/2001/XMLSchema#";

export const XSD_STRING = `${XSD_NAMESPACE}string`;
export const XSD_INTEGER = `${XSD_NAMESPACE}integer`;
export const XSD_FLOAT = `${XSD_NAMESPACE}float`;
export const XSD_BOOLEAN = `${XSD_NAMESPACE}boolean`;
