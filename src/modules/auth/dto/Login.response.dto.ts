export interface LoginResponseDto {
  accessToken: string;
  tokenType: 'bearer';
}
