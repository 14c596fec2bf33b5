export {
	createNotificationMultiplexer,
	DEFAULT_NOTIFICATION_BUFFER_SIZE,
	type DropEvent,
	type NotificationMultiplexer,
	type NotificationMultiplexerOptions,
	type NotificationStream,
	type SubscribeOptions,
} from "./notification-multiplexer";
export {
	createOperationQueue,
	DEFAULT_OPERATION_TIMEOUT_MS,
	type EnqueueOptions,
	type OperationContext,
	type OperationKind,
	type OperationQueue,
	type OperationQueueOptions,
	type PendingOperationInfo,
} from "./operation-queue";
export {
	DEFAULT_MAX_RETRY_DELAY_MS,
	DEFAULT_RETRY_ATTEMPTS,
	DEFAULT_RETRY_DELAY_MS,
	type RetryOptions,
	withRetry,
} from "./retry";
export {
	createScanner,
	DEFAULT_FIND_TIMEOUT_MS,
	type FindDeviceOptions,
	matchesFilters,
	type ScannerOptions,
	type ScanOptions,
	type ScanStream,
	type Scanner,
} from "./scanner";
export {
	type ConnectOptions,
	createSession,
	type DeviceSession,
	type OperationOptions,
	type SessionOptions,
	type StateChange,
	type UuidLike,
} from "./session";
