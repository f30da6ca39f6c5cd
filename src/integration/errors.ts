/**
 * Integration Module - Error Types
 */

export type IntegrationError =
  | {
      readonly type: "UNKNOWN_ENTITY";
      readonly entityId: string;
    }
  | {
      readonly type: "UNKNOWN_GROUP";
      readonly groupName: string;
    };

export const unknownEntity = (entityId: string): IntegrationError => ({
  type: "UNKNOWN_ENTITY",
  entityId,
});

export const unknownGroup = (groupName: string): IntegrationError => ({
  type: "UNKNOWN_GROUP",
  groupName,
});

/**
 * Format an IntegrationError for logging.
 */
export function formatIntegrationError(error: IntegrationError): string {
  switch (error.type) {
    case "UNKNOWN_ENTITY":
      return `No switch with entity id ${error.entityId}`;
    case "UNKNOWN_GROUP":
      return `Group "${error.groupName}" is not set up`;
  }
}
