export { DLCI } from './DLCI'
export { Credits, CreditFlowController, FlowControlMode, FlowController, SimpleController } from './FlowControl'
export { FlowControlledData, Frame, FrameType, UserData } from './Frame'
export { FrameQueue, QueueSender } from './FrameQueue'
export { FullDuplexStream } from './FullDuplexStream'
export { RfcommError, RfcommErrorCode } from './RfcommError'
export { Role } from './Role'
export { SessionChannel } from './SessionChannel'
export { CREDIT_FLOW_CONTROL, InspectNode, NO_FLOW_CONTROL, SessionInspect } from './SessionInspect'
export { SessionMultiplexer } from './SessionMultiplexer'
export { SessionMultiplexerOptions } from './SessionMultiplexerOptions'
export { SessionObserver } from './SessionObserver'
export { ParameterNegotiationState, SessionParameters } from './SessionParameters'
export { readAsync, writeAsync } from './Utilities'
