// Re-export all adapters from a single entry point.
export { UplistingPmsAdapter } from './uplisting';
export { TextMagicAdapter } from './textmagic';
export { LibPhoneNumberNormalizer } from './libphonenumber';
export { StubPmsAdapter } from './stub-pms';
export { StubMessagingAdapter } from './stub-messaging';
