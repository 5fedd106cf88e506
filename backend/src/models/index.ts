// Export stage models from one place so services and routes share the same shapes

export * from './Presentation';
export * from './Generation';
