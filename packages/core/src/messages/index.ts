export { CallbackMessageSink, type MessageSink, serializeMessage, WritableMessageSink } from "./sink";
export {
	type JsonSchema,
	type JsonSchemaType,
	type Message,
	type RecordMessage,
	recordMessage,
	type SchemaMessage,
	schemaMessage,
	type StateMessage,
	stateMessage,
	type StreamSchema,
} from "./types";
